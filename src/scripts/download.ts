import { basename } from 'path';
import { ConfigManager } from '../config/index.js';
import { createDownloader } from '../http/downloader.js';
import { isNotFoundError } from '../http/errors.js';
import type { DownloadRequest } from '../http/types.js';
import { writeFile } from '../utils/filesystem.js';
import { logger } from '../utils/logger.js';

export interface CliArgs extends DownloadRequest {
  output?: string;
}

export function parseArgs(argv: string[]): CliArgs | undefined {
  const positional: string[] = [];
  let certPath: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--cert') {
      certPath = argv[++i];
      if (!certPath) {
        return undefined;
      }
    } else if (arg.startsWith('--cert=')) {
      certPath = arg.slice('--cert='.length);
    } else {
      positional.push(arg);
    }
  }

  const [url, output] = positional;
  if (!url || positional.length > 2) {
    return undefined;
  }
  return { url, output, certPath };
}

const FALLBACK_NAME = 'download.bin';

/** File name for a URL when no output path is given. */
export function defaultOutputPath(url: string): string {
  try {
    return basename(new URL(url).pathname) || FALLBACK_NAME;
  } catch {
    return FALLBACK_NAME;
  }
}

const USAGE = 'Usage: download <url> [output] [--cert <pem-file>]';

/**
 * Download a URL to a file. Resolves the process exit code.
 */
export async function run(argv: string[]): Promise<number> {
  const args = parseArgs(argv);

  if (!args) {
    console.error(USAGE);
    return 1;
  }

  const manager = ConfigManager.getInstance();
  if (args.certPath) {
    manager.updateConfig({ download: { ...manager.get('download'), certPath: args.certPath } });
  }

  const outputPath = args.output ?? defaultOutputPath(args.url);

  try {
    const downloader = createDownloader(manager.get('download'));
    const data = await downloader.download(args.url);
    await writeFile(outputPath, data);
    logger().info(`Saved ${data.length} bytes to ${outputPath}`);
    return 0;
  } catch (error) {
    if (isNotFoundError(error)) {
      logger().error(`Nothing found at ${args.url}`);
    }
    return 1;
  }
}
