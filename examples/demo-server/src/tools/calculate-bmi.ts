import { textResult, type TetherTool, type ToolResult } from '@tether/core';

export const calculateBmiTool: TetherTool<{ weightKg: number; heightM: number }> = {
  name: 'calculate-bmi',
  description: 'Calculates Body Mass Index from weight and height.',
  inputSchema: {
    type: 'object',
    properties: {
      weightKg: { type: 'number', description: 'Weight in kilograms' },
      heightM: { type: 'number', description: 'Height in meters', minimum: 0.1 },
    },
    required: ['weightKg', 'heightM'],
  },
  annotations: {
    title: 'BMI Calculator',
    readOnlyHint: true,
    openWorldHint: false,
  },
  handler: async ({ weightKg, heightM }, ctx): Promise<ToolResult> => {
    // Only reachable when the handler is called directly
    if (heightM <= 0) {
      return textResult('Height must be positive', true);
    }

    ctx.logger.debug('Calculating BMI', { weightKg, heightM });
    const bmi = weightKg / (heightM * heightM);
    return textResult(`BMI: ${bmi.toFixed(2)}`);
  },
};
