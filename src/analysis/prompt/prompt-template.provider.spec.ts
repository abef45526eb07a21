import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { ConfigurationError } from '@libs/exceptions';

import { loadPromptTemplate } from './prompt-template.provider';

describe('loadPromptTemplate', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'prompt-'));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads the bundled template', async () => {
    const text = await loadPromptTemplate('prompts/branding_prompt.md');

    expect(text).toContain('marcas_match');
    expect(text).toContain('consideracoes_imagem_marca');
  });

  it('returns the file contents unchanged', async () => {
    const path = join(dir, 'custom.md');
    await writeFile(path, 'Describe the creator.\n');

    await expect(loadPromptTemplate(path)).resolves.toBe(
      'Describe the creator.\n',
    );
  });

  it('raises a configuration error for a missing file', async () => {
    await expect(
      loadPromptTemplate(join(dir, 'missing.md')),
    ).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('raises a configuration error for an empty file', async () => {
    const path = join(dir, 'empty.md');
    await writeFile(path, '  \n');

    await expect(loadPromptTemplate(path)).rejects.toMatchObject({
      missing: ['PROMPT_TEMPLATE_PATH'],
      message: `Prompt template at ${path} is empty`,
    });
  });
});
