/**
 * Rendering of analysis results for stdout.
 *
 * The text format is the stable one-line-per-diagnostic format and is never
 * coloured, so it can be piped and diffed.
 */

import { formatCode, formatDiagnostic, type AnalysisResult } from 'stylelens-core';

export type OutputFormat = 'text' | 'json';

export interface JsonDiagnostic {
  file: string;
  line: number;
  code: string;
  message: string;
}

/**
 * Render every diagnostic of every result, in the order given.
 * Returns an empty string in text mode when there is nothing to report.
 */
export function renderResults(results: readonly AnalysisResult[], format: OutputFormat): string {
  if (format === 'json') {
    const diagnostics: JsonDiagnostic[] = results.flatMap((result) =>
      result.diagnostics.map((d) => ({
        file: d.filePath,
        line: d.line,
        code: formatCode(d.code),
        message: d.message,
      }))
    );
    return `${JSON.stringify(diagnostics, null, 2)}\n`;
  }

  const lines = results.flatMap((result) => result.diagnostics.map(formatDiagnostic));
  return lines.length > 0 ? `${lines.join('\n')}\n` : '';
}
