export {
  createAddTool,
  createDivideTool,
  createMultiplyTool,
  createSubtractTool,
} from './arithmetic.js';
export { createWeatherTool } from './weather.js';
export type { WeatherReport } from './weather.js';
