// engine/util/assert-never.ts — Exhaustiveness guard for closed tagged variants

export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}
