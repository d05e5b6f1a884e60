import { describe, it, expect } from '@jest/globals';
import { PromptComposer } from '../../../src/app/stream/prompt-composer.js';
import { StaticTemplates } from '../../helpers/stream-fixtures.js';

const templates = new StaticTemplates({
  persona: 'You are Mio.',
  'mode/normal_monologue': 'talk|{{memory}}',
});

describe('PromptComposer', () => {
  it('offers long-term memory to every template', () => {
    const composer = new PromptComposer(templates, { getContextSummary: () => '- they liked trains' });

    expect(composer.composeMonologue({ mode: 'normal_monologue', history: [], theme: null })).toBe(
      'You are Mio.\n\ntalk|- they liked trains'
    );
  });

  it('says nothing notable happened before the first digest', () => {
    const composer = new PromptComposer(templates, { getContextSummary: () => '' });

    expect(composer.composeMonologue({ mode: 'normal_monologue', history: [], theme: null })).toBe(
      'You are Mio.\n\ntalk|(nothing notable yet)'
    );
  });
});
