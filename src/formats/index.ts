import { pm1Format } from './pm1';
import { stringTableFormat } from './stringTable';
import { FormatParser } from './types';

export * from './types';
export { heuristicFormat } from './heuristic';
export { pm1Format } from './pm1';
export { readStringTableOffsets, stringTableFormat } from './stringTable';

/**
 * Structured formats in detection priority order. The heuristic scanner is
 * always the last resort and is not part of this list.
 */
export const DEFAULT_FORMATS: readonly FormatParser[] = [stringTableFormat, pm1Format];

