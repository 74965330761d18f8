/**
 * Preamble and byte-order-mark detection
 *
 * A preamble is free text above the table, set off by a blank line. A line
 * is blank when it holds only spaces and tabs. The UTF-8 BOM, when present,
 * always counts as part of the preamble.
 */

import { CR, LF, SPACE, TAB } from "../bytes";

const UTF8_BOM = [0xef, 0xbb, 0xbf] as const;

/**
 * 3 when the sample starts with a UTF-8 BOM, 0 otherwise
 */
export function lenBOM(sample: Uint8Array): number {
  return sample.length >= 3 && sample[0] === UTF8_BOM[0] && sample[1] === UTF8_BOM[1] && sample[2] === UTF8_BOM[2]
    ? 3
    : 0;
}

/**
 * Estimated length in bytes of the preamble
 *
 * Returns the offset just past the last blank line that is followed by a
 * non-blank line (blank lines at the very end are ignored), or just the BOM
 * length when there is no such line.
 */
export function lenPreamble(sample: Uint8Array): number {
  const bom = lenBOM(sample);
  const data = sample.subarray(bom);

  let i = data.length - 1;
  for (; i >= 0; i--) {
    const byte = data[i];
    if (byte !== LF && byte !== CR && byte !== SPACE && byte !== TAB) {
      break;
    }
  }

  let inEmptyLine = false;
  let length = i + 1;
  for (; i >= 0; i--) {
    const byte = data[i];
    if (byte === LF) {
      if (inEmptyLine) {
        return length + bom;
      }
      inEmptyLine = true;
      length = i + 1;
    } else if (byte !== SPACE && byte !== TAB) {
      inEmptyLine = false;
    }
  }

  return inEmptyLine ? length + bom : bom;
}
