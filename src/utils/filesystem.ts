import { promises as fs } from 'fs';
import { dirname } from 'path';
import { logger } from './logger.js';

export class FileSystemUtils {
  /**
   * Ensure directory exists, create if not
   */
  public static async ensureDir(dirPath: string): Promise<void> {
    try {
      await fs.mkdir(dirPath, { recursive: true });
      logger().debug(`Directory ensured: ${dirPath}`);
    } catch (error) {
      logger().error(`Failed to create directory: ${dirPath}`, { error });
      throw error;
    }
  }

  /**
   * Write content to file, creating parent directories as needed
   */
  public static async writeFile(filePath: string, content: string | Uint8Array): Promise<void> {
    try {
      await this.ensureDir(dirname(filePath));
      await fs.writeFile(filePath, content);
      logger().debug(`Wrote file: ${filePath}`);
    } catch (error) {
      logger().error(`Failed to write file: ${filePath}`, { error });
      throw error;
    }
  }
}

export const ensureDir = FileSystemUtils.ensureDir.bind(FileSystemUtils);
export const writeFile = FileSystemUtils.writeFile.bind(FileSystemUtils);
