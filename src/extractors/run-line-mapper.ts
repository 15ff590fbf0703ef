/**
 * Run-to-line mapping
 *
 * A paragraph's line breaks live inside its run texts, and runs do not respect
 * line boundaries: one run may span several lines, one line may be built from
 * several runs. Formatting per line therefore has to be recovered by walking
 * the runs against the lines.
 */

import { TextRun } from '../models/document.model';

/**
 * Runs contributing visible (non-whitespace) characters to each line, indexed
 * by line, each run listed once per line in document order.
 *
 * `lines` is the paragraph text split on '\n'. A `\n` in a run advances the
 * cursor to the next line; a cursor running past the end of its line moves on
 * to the next one.
 */
export function mapLinesToRuns(lines: readonly string[], runs: readonly TextRun[]): TextRun[][] {
  const mapping: TextRun[][] = lines.map(() => []);
  let line = 0;
  let offset = 0;

  for (const run of runs) {
    for (let i = 0; i < run.text.length; i++) {
      const char = run.text.charAt(i);

      if (char === '\n') {
        line++;
        offset = 0;
        continue;
      }

      while (line < lines.length && offset >= lines[line].length) {
        line++;
        offset = 0;
      }
      if (line >= lines.length) {
        return mapping;
      }

      const contributors = mapping[line];
      if (char.trim() !== '' && contributors[contributors.length - 1] !== run) {
        contributors.push(run);
      }
      offset++;
    }
  }

  return mapping;
}
