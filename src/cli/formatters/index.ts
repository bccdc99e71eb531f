export { HumanFormatter } from './human.js';
export { JsonFormatter } from './json.js';
export { CompactFormatter } from './compact.js';
export { OUTPUT_FORMATS } from './types.js';
export type { OutputFormat, FormatOptions, IFormatter } from './types.js';
