import { format } from 'date-fns';

const KIB = 1024;
const MIB = 1024 * 1024;

export function formatSpeed(bytesPerSecond: number): string {
  const kb = Math.floor(bytesPerSecond / KIB);
  const mb = Math.floor(bytesPerSecond / MIB);
  return `${bytesPerSecond} B/s, ${kb} KB/s, ${mb} MB/s`;
}

export function formatStatusLine(at: Date, bytesPerSecond: number): string {
  return `[${format(at, 'yyyy-MM-dd HH:mm:ss')}] Average speed: ${formatSpeed(bytesPerSecond)}`;
}

export function formatSummaryLine(totalBytes: number, bytesPerSecond: number): string {
  return `Download completed: ${totalBytes} bytes downloaded at an average speed of ${formatSpeed(bytesPerSecond)}`;
}
