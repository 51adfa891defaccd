/**
 * Capture `console.warn` output for the duration of a callback.
 *
 * Dev warnings are plain `console.warn` calls, so tests swap the method out
 * rather than mocking a logger.
 */

export type CapturedWarnings<R> = Readonly<{
  result: R;
  warnings: readonly string[];
}>;

export function captureWarnings<R>(fn: () => R): CapturedWarnings<R> {
  const warnings: string[] = [];
  const original = console.warn;
  console.warn = (...args: unknown[]) => {
    warnings.push(args.map((a) => String(a)).join(" "));
  };
  try {
    const result = fn();
    return Object.freeze({ result, warnings: Object.freeze(warnings) });
  } finally {
    console.warn = original;
  }
}
