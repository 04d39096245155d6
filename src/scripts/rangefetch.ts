#!/usr/bin/env node
/**
 * Download a file over parallel range requests, printing the average speed every second.
 *
 * Usage:
 *   rangefetch <url>
 */

import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';
import { createHttpClient } from '../http/client.js';
import { ParallelDownloader } from '../download/orchestrator.js';
import { ArgumentError, toError } from '../errors.js';
import { error } from '../utils/logger.js';

export const USAGE = 'Usage: rangefetch <url>';

/**
 * Validate the positional arguments and return the normalized URL.
 */
export function parseArguments(args: readonly string[]): string {
  if (args.length === 0 || args[0] === '') {
    throw new ArgumentError('URL is required');
  }
  if (args.length > 1) {
    throw new ArgumentError(`Expected exactly one URL argument, got ${args.length}`);
  }

  const raw = args[0];
  let parsed: URL;
  try {
    parsed = new URL(raw);
  } catch (err) {
    throw new ArgumentError(`Invalid URL: ${raw}`, toError(err));
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ArgumentError(`Unsupported protocol "${parsed.protocol}" in ${raw}`);
  }
  return parsed.toString();
}

export async function main(args: readonly string[] = process.argv.slice(2)): Promise<number> {
  let url: string;
  try {
    url = parseArguments(args);
  } catch (err) {
    console.error(USAGE);
    error(toError(err).message);
    return 1;
  }

  try {
    const downloader = new ParallelDownloader({ client: createHttpClient() });
    await downloader.download(url);
    return 0;
  } catch (thrown) {
    const err = toError(thrown);
    error(`${err.name}: ${err.message}`);
    return 1;
  }
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) {
    return false;
  }
  try {
    return realpathSync(entry) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  main().then(
    (code) => process.exit(code),
    (err: unknown) => {
      console.error(err);
      process.exit(1);
    }
  );
}
