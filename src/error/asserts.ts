export class InvariantViolation extends Error {}

export function must<T>(v: T | undefined | null, msg?: string): T {
  // eslint-disable-next-line eqeqeq
  if (v == null) {
    throw new InvariantViolation(msg ?? `Unexpected ${v} value`);
  }
  return v;
}
