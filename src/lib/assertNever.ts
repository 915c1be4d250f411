export function assertNever(value: never, label: string): never {
  throw new Error(`Unhandled ${label}: ${JSON.stringify(value)}`);
}
