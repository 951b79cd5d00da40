export type ToolErrorKind = 'invalid_input' | 'upstream' | 'storage';

const STATUS_BY_KIND: Record<ToolErrorKind, number> = {
  invalid_input: 400,
  upstream: 502,
  storage: 500,
};

export class ToolError extends Error {
  readonly kind: ToolErrorKind;

  constructor(kind: ToolErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ToolError';
    this.kind = kind;
  }

  get status(): number {
    return STATUS_BY_KIND[this.kind];
  }
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: ToolError };

export const ok = <T>(value: T): Result<T> => ({ ok: true, value });
export const fail = <T = never>(error: ToolError): Result<T> => ({ ok: false, error });

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Runs an external call and folds any throw into a failed Result.
 * ToolErrors pass through untouched; anything else becomes `kind`.
 */
export async function attempt<T>(
  source: string,
  call: () => Promise<T>,
  kind: ToolErrorKind = 'upstream',
): Promise<Result<T>> {
  try {
    return ok(await call());
  } catch (error) {
    if (error instanceof ToolError) return fail(error);
    return fail(new ToolError(kind, `${source} failed: ${describeError(error)}`, { cause: error }));
  }
}

export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) throw result.error;
  return result.value;
}
