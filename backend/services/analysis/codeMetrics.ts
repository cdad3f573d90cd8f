export interface CodeMetrics {
  totalLines: number;
  functionsAnalyzed: number;
}

const countOccurrences = (text: string, token: string): number => text.split(token).length - 1;

/**
 * Line and function counts for a contract. The function count is a textual
 * approximation: every "function " token counts, including ones inside
 * comments and string literals.
 */
export const measureCode = (code: string): CodeMetrics => ({
  totalLines: countOccurrences(code, "\n") + 1,
  functionsAnalyzed: countOccurrences(code, "function "),
});
