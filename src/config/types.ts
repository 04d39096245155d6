export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface Config {
  // Rolling throughput window
  throughput: {
    windowMs: number;
    windowCapacity: number;
  };

  // Status line cadence
  reporter: {
    intervalMs: number;
  };

  // Outgoing request settings
  http: {
    userAgent: string;
  };

  // Logging settings
  logging: {
    level: LogLevel;
    file?: string;
  };
}
