export { CORRELATION_THRESHOLD } from './constants';
export { selfEnergy, correlateAt, findOccurrences } from './correlator';
export type { Occurrence, Samples } from './correlator';
export { identify, formatOccurrences } from './identify';
