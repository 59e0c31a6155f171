import type { CellwidthErrorCode } from "../../mod.ts";
import { isCellwidthError } from "../../mod.ts";

export function assertOk(value: unknown, message?: string): void {
  if (!value) {
    throw new Error(message ?? "Assertion failed");
  }
}

export function assertEqual<T>(actual: T, expected: T, message?: string): void {
  if (actual !== expected) {
    throw new Error(message ?? `Expected ${String(expected)}, got ${String(actual)}`);
  }
}

export function assertDeepEqual(actual: unknown, expected: unknown, message?: string): void {
  if (!deepEqual(actual, expected)) {
    throw new Error(
      message ??
        `Deep equal assertion failed: expected ${JSON.stringify(expected)}, got ${JSON.stringify(actual)}`,
    );
  }
}

/**
 * Run `fn` and require a CellwidthError with the given code.
 */
export function assertThrowsCode(fn: () => unknown, code: CellwidthErrorCode): void {
  try {
    fn();
  } catch (error) {
    if (isCellwidthError(error, code)) return;
    throw new Error(`Expected ${code}, got ${String(error)}`);
  }
  throw new Error(`Expected ${code}, nothing was thrown`);
}

export async function assertRejectsCode(
  fn: () => Promise<unknown>,
  code: CellwidthErrorCode,
): Promise<void> {
  try {
    await fn();
  } catch (error) {
    if (isCellwidthError(error, code)) return;
    throw new Error(`Expected ${code}, got ${String(error)}`);
  }
  throw new Error(`Expected ${code}, nothing was thrown`);
}

function deepEqual(leftValue: unknown, rightValue: unknown): boolean {
  if (Object.is(leftValue, rightValue)) return true;
  if (typeof leftValue !== typeof rightValue) return false;
  if (leftValue === null || rightValue === null) return false;
  if (typeof leftValue !== "object" || typeof rightValue !== "object") return false;

  if (Array.isArray(leftValue) && Array.isArray(rightValue)) {
    if (leftValue.length !== rightValue.length) return false;
    for (let index = 0; index < leftValue.length; index += 1) {
      if (!deepEqual(leftValue[index], rightValue[index])) return false;
    }
    return true;
  }

  if (Array.isArray(leftValue) || Array.isArray(rightValue)) return false;

  const keysA = Object.keys(leftValue).sort();
  const keysB = Object.keys(rightValue).sort();
  if (keysA.length !== keysB.length) return false;
  for (let index = 0; index < keysA.length; index += 1) {
    const keyA = keysA[index] ?? "";
    const keyB = keysB[index] ?? "";
    if (keyA !== keyB) return false;
    if (!deepEqual(Reflect.get(leftValue, keyA), Reflect.get(rightValue, keyB))) return false;
  }
  return true;
}
