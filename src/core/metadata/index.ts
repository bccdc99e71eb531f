export * from './types.js';
export { loadEcosystem, type LoaderOptions } from './loader.js';
export { readIndexFile, readOverridesDir } from './reader.js';
export { DescriptorSchema, type Descriptor } from './schema.js';
