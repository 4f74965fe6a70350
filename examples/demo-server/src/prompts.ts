import type { PromptMessage, TetherPrompt } from '@tether/core';

export const reviewCodePrompt: TetherPrompt = {
  name: 'review-code',
  description: 'Asks the model to review a code snippet',
  arguments: [
    { name: 'code', description: 'The code snippet to review', required: true },
    {
      name: 'focus',
      description: 'Area of focus for the review (performance, security, style, general)',
      required: false,
    },
  ],
  handler: async (args, ctx): Promise<PromptMessage[]> => {
    const code = args['code'] ?? '';
    const focus = args['focus'] ?? 'general';
    ctx.logger.debug('Building review prompt', { focus });

    let text = 'Please review the following code for potential issues and suggest improvements';
    if (focus !== 'general') {
      text += `, focusing specifically on ${focus}`;
    }
    text += `:\n\n\`\`\`\n${code}\n\`\`\``;

    return [{ role: 'user', content: { type: 'text', text } }];
  },
};
