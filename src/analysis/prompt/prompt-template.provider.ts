import { FactoryProvider } from '@nestjs/common';
import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';

import { AppConfigService } from '@libs/config';
import { ConfigurationError } from '@libs/exceptions';

export const PROMPT_TEMPLATE = Symbol('PROMPT_TEMPLATE');

/**
 * Reads the instruction template once; relative paths resolve from the
 * working directory.
 */
export async function loadPromptTemplate(path: string): Promise<string> {
  const fullPath = resolve(path);
  let text: string;

  try {
    text = await readFile(fullPath, 'utf8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(
      `Prompt template could not be read from ${fullPath}: ${reason}`,
      ['PROMPT_TEMPLATE_PATH'],
    );
  }

  if (!text.trim()) {
    throw new ConfigurationError(`Prompt template at ${fullPath} is empty`, [
      'PROMPT_TEMPLATE_PATH',
    ]);
  }

  return text;
}

export const promptTemplateProvider: FactoryProvider<string> = {
  provide: PROMPT_TEMPLATE,
  useFactory: (config: AppConfigService) =>
    loadPromptTemplate(config.promptTemplatePath),
  inject: [AppConfigService],
};
