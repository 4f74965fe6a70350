import type { TetherTool } from '@tether/core';
import { greetTool } from './tools/greet.js';
import { calculateBmiTool } from './tools/calculate-bmi.js';
import { fetchWeatherTool } from './tools/fetch-weather.js';

export const demoTools: TetherTool[] = [
  greetTool,
  calculateBmiTool,
  fetchWeatherTool,
];
