export * from './args.js';
export * from './report.js';
export { run, VERSION } from './run.js';
