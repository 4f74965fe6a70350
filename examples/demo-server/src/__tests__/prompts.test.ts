import { describe, it, expect } from 'vitest';
import { reviewCodePrompt } from '../prompts.js';
import { makeCtx } from './helpers.js';

describe('review-code prompt', () => {
  it('declares code as required and focus as optional', () => {
    expect(reviewCodePrompt.arguments?.map(arg => [arg.name, arg.required])).toEqual([
      ['code', true],
      ['focus', false],
    ]);
  });

  it('builds a general review by default', async () => {
    const messages = await reviewCodePrompt.handler({ code: 'let x = 1;' }, makeCtx());
    expect(messages).toEqual([
      {
        role: 'user',
        content: {
          type: 'text',
          text: 'Please review the following code for potential issues and suggest improvements:\n\n```\nlet x = 1;\n```',
        },
      },
    ]);
  });

  it('names a specific focus', async () => {
    const messages = await reviewCodePrompt.handler({ code: 'eval(input)', focus: 'security' }, makeCtx());
    expect(messages[0]?.content).toEqual({
      type: 'text',
      text:
        'Please review the following code for potential issues and suggest improvements, ' +
        'focusing specifically on security:\n\n```\neval(input)\n```',
    });
  });

  it('treats an explicit general focus like the default', async () => {
    const messages = await reviewCodePrompt.handler({ code: 'x', focus: 'general' }, makeCtx());
    expect(messages[0]?.content).toEqual({
      type: 'text',
      text: 'Please review the following code for potential issues and suggest improvements:\n\n```\nx\n```',
    });
  });
});
