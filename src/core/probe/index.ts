export { LinkProber, DEFAULT_PROBE_CONFIG } from './prober.js';
export { isLive, type FetchLike, type ProbeConfig, type ProbeOutcome } from './types.js';
