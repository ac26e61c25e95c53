/**
 * Masks a string by replacing alphanumeric characters with asterisks, leaving
 * only the last few characters visible. Meant for diagnostic data such as site
 * ids, drive ids and file names; secrets belong in {@link Redacted}.
 *
 * Returns `"__erroneous__"` for nullish input and `"[Smeared]"` when fewer than
 * three characters would be masked.
 *
 * @example
 * smear('password');    // "****word"
 * smear('hello', 2);    // "***lo"
 * smear('ab');          // "[Smeared]"
 */
export function smear(text: string | null | undefined, leaveOver = 4): string {
  if (text === undefined || text === null) {
    return '__erroneous__';
  }
  if (!text.length || text.length <= leaveOver) return '[Smeared]';

  const charsToSmear = text.length - leaveOver;
  if (charsToSmear < 3) return '[Smeared]';

  const end = text.substring(text.length - leaveOver);
  const toSmear = text.substring(0, text.length - leaveOver);
  return `${toSmear.replaceAll(/[a-zA-Z0-9_]/g, '*')}${end}`;
}

export const LogsDiagnosticDataPolicy = {
  CONCEAL: 'conceal',
  DISCLOSE: 'disclose',
} as const;
export type LogsDiagnosticDataPolicy =
  (typeof LogsDiagnosticDataPolicy)[keyof typeof LogsDiagnosticDataPolicy];

/**
 * Returns a function that smears values under the `conceal` policy and passes
 * them through under `disclose`.
 */
export function createConcealer(
  policy: LogsDiagnosticDataPolicy,
): (value: string | null | undefined) => string {
  if (policy === LogsDiagnosticDataPolicy.DISCLOSE) {
    return (value) => value ?? '__erroneous__';
  }
  return (value) => smear(value);
}
