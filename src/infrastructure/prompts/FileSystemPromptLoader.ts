import * as fs from 'fs/promises';
import * as path from 'path';
import { IPromptLoader, PromptName, PromptVariables } from '../../domain/services/IPromptLoader';
import { ILogger } from '../../domain/common/ILogger';
import { ConfigError, errorMessage } from '../../domain/common/Errors';

const PLACEHOLDER = /\{\{\s*([a-zA-Z0-9_]+)\s*\}\}/g;

/**
 * Loads Markdown prompt templates (`<name>.md`) from a directory and caches them.
 */
export class FileSystemPromptLoader implements IPromptLoader {
  private readonly cache = new Map<PromptName, string>();

  constructor(private readonly promptsDir: string, private readonly logger: ILogger) {}

  async render(name: PromptName, variables: PromptVariables): Promise<string> {
    const template = await this.load(name);
    return template.replace(PLACEHOLDER, (_match, key: string) => variables[key] ?? '');
  }

  private async load(name: PromptName): Promise<string> {
    const cached = this.cache.get(name);
    if (cached !== undefined) return cached;

    const file = path.join(this.promptsDir, `${name}.md`);
    try {
      const template = await fs.readFile(file, 'utf-8');
      this.cache.set(name, template);
      this.logger.debug(`Loaded prompt template: ${name}`);
      return template;
    } catch (err) {
      throw new ConfigError(`Prompt template "${name}" could not be read from ${file}: ${errorMessage(err)}`);
    }
  }
}
