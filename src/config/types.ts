export interface Config {
  // Download settings
  download: {
    userAgent: string;
    certPath?: string;
    chunkSize: number; // Bytes per read
    speedSamples: number;
    tickInterval: number; // Milliseconds between redraws
  };

  // Logging settings
  logging: {
    level: 'error' | 'warn' | 'info' | 'debug';
    file?: string;
  };
}
