import { describe, it, expect } from '@jest/globals';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { PromptComposer } from '../../../src/app/stream/prompt-composer.js';
import {
  FilePromptTemplates,
  PROMPT_TEMPLATE_NAMES,
  getDefaultTemplateDir,
  seedPromptTemplates,
} from '../../../src/infra/prompts/template-loader.js';

function tempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'streamer-prompts-'));
}

describe('FilePromptTemplates', () => {
  it('ships every template the composer asks for', () => {
    expect(new FilePromptTemplates().findMissing()).toEqual([]);
    expect(PROMPT_TEMPLATE_NAMES).toHaveLength(13);
  });

  it('fills the bundled mode templates', () => {
    const composer = new PromptComposer(new FilePromptTemplates());
    const prompt = composer.composeMonologue({
      mode: 'theme_continuation',
      history: [],
      theme: 'Retro consoles',
    });

    expect(prompt).toContain('Retro consoles');
    expect(prompt).not.toContain('{{');
  });

  it('prefers a user override and caches what it read', () => {
    const userDir = tempDir();
    const overridePath = path.join(userDir, 'greeting.md');
    fs.writeFileSync(overridePath, 'Custom greeting');
    const templates = new FilePromptTemplates({ userDir });

    expect(templates.resolve('greeting')).toBe(overridePath);
    expect(templates.load('greeting')).toBe('Custom greeting');

    fs.writeFileSync(overridePath, 'Edited greeting');
    expect(templates.load('greeting')).toBe('Custom greeting');
    templates.clearCache();
    expect(templates.load('greeting')).toBe('Edited greeting');

    expect(templates.resolve('farewell')).toBe(path.join(getDefaultTemplateDir(), 'farewell.md'));
  });

  it('reports a template that exists nowhere', () => {
    const emptyDir = tempDir();
    const templates = new FilePromptTemplates({ defaultDir: emptyDir });

    expect(() => templates.load('persona')).toThrow(`Prompt template not found: ${path.join(emptyDir, 'persona.md')}`);
    expect(templates.findMissing()).toEqual(PROMPT_TEMPLATE_NAMES);
  });
});

describe('seedPromptTemplates', () => {
  it('copies missing templates and keeps edited ones', () => {
    const target = tempDir();
    fs.writeFileSync(path.join(target, 'persona.md'), 'My persona');

    const written = seedPromptTemplates(target);

    expect(written).toHaveLength(12);
    expect(written).not.toContain('persona.md');
    expect(written).toContain(path.join('mode', 'deep_dive.md'));
    expect(fs.readFileSync(path.join(target, 'persona.md'), 'utf-8')).toBe('My persona');
    expect(seedPromptTemplates(target)).toEqual([]);
  });
});
