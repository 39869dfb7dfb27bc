export type { OutputPort, OutputSpinner } from './output.js';
export { consoleOutput } from './console-output.js';
export { resolveOutput } from './resolve.js';
