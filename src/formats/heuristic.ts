import { FormatDescriptor } from './types';

/**
 * Files read by the printable-run scanner. Slots are fixed: nothing tells the
 * engine what else in the file points at a string.
 */
export const heuristicFormat: FormatDescriptor = {
  name: 'heuristic',
  extensions: ['.pac', '.pak', '.bf', '.msg', '.bin'],
  supportsSafeGrowth: false,
  padByte: 0x20,
};
