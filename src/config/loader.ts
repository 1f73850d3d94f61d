import { readFile } from 'fs/promises';
import { join } from 'path';
import { ZodError } from 'zod';
import { CrewConfigSchema, type CrewConfig } from './schema.js';
import { logger } from '../utils/logger.js';

export const CONFIG_FILE_NAME = 'crew.json';

export class ConfigLoader {
  private configDir: string;
  private cachedConfig: CrewConfig | null = null;

  constructor(configDir: string) {
    this.configDir = configDir;
  }

  get configPath(): string {
    return join(this.configDir, CONFIG_FILE_NAME);
  }

  /**
   * Load crew.json, falling back to defaults when the file does not exist.
   */
  async load(): Promise<CrewConfig> {
    if (this.cachedConfig) {
      return this.cachedConfig;
    }

    const configPath = this.configPath;
    let raw: string;

    try {
      raw = await readFile(configPath, 'utf-8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        logger.debug('No config file, using defaults', { path: configPath });
        this.cachedConfig = CrewConfigSchema.parse({});
        return this.cachedConfig;
      }
      throw err;
    }

    try {
      const parsed: unknown = JSON.parse(raw);
      this.cachedConfig = CrewConfigSchema.parse(parsed);
      logger.info('Loaded crew config', { path: configPath });
      return this.cachedConfig;
    } catch (err) {
      if (err instanceof SyntaxError) {
        throw new Error(`Invalid JSON in config file: ${configPath}`, { cause: err });
      }
      if (err instanceof ZodError) {
        const details = err.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
        throw new Error(`Invalid config file ${configPath}:\n  ${details.join('\n  ')}`, { cause: err });
      }
      throw err;
    }
  }
}
