export type ModelErrorKind =
  | 'timeout'
  | 'rate_limit'
  | 'auth'
  | 'payment'
  | 'not_found'
  | 'server'
  | 'unknown';

export interface ModelQueryError {
  readonly model: string;
  readonly kind: ModelErrorKind;
  readonly message: string;
  readonly statusCode?: number;
}

export function createModelQueryError(
  model: string,
  kind: ModelErrorKind,
  message: string,
  statusCode?: number,
): ModelQueryError {
  const error: ModelQueryError = statusCode === undefined
    ? { model, kind, message }
    : { model, kind, message, statusCode };
  return Object.freeze(error);
}

export function kindForStatus(status: number): ModelErrorKind {
  if (status === 401) return 'auth';
  if (status === 402) return 'payment';
  if (status === 404) return 'not_found';
  if (status === 429) return 'rate_limit';
  if (status >= 500 && status <= 599) return 'server';
  return 'unknown';
}

/**
 * Error for a non-2xx HTTP reply. Known statuses get a fixed message; for
 * anything else the provider's body text is kept as-is.
 */
export function classifyHttpFailure(model: string, status: number, body: string): ModelQueryError {
  const kind = kindForStatus(status);
  switch (kind) {
    case 'auth':
      return createModelQueryError(model, kind, 'Invalid API key. Check OPENROUTER_API_KEY.', status);
    case 'payment':
      return createModelQueryError(model, kind, 'Payment required. Add credits to the OpenRouter account.', status);
    case 'not_found':
      return createModelQueryError(model, kind, `Model "${model}" not found on OpenRouter.`, status);
    case 'rate_limit':
      return createModelQueryError(model, kind, 'Rate limit exceeded. Wait before retrying.', status);
    case 'server':
      return createModelQueryError(model, kind, `OpenRouter server error (HTTP ${status}).`, status);
    default:
      return createModelQueryError(model, kind, body || `HTTP ${status}`, status);
  }
}

/** One-line digest of a set of failures, grouped by kind. */
export function summarizeErrors(errors: readonly ModelQueryError[]): string {
  if (errors.length === 0) return 'Please try again.';

  const byKind = new Map<ModelErrorKind, ModelQueryError[]>();
  for (const error of errors) {
    const group = byKind.get(error.kind) ?? [];
    group.push(error);
    byKind.set(error.kind, group);
  }

  const parts: string[] = [];
  if (byKind.has('auth')) parts.push('API key issue, check OPENROUTER_API_KEY');
  if (byKind.has('payment')) parts.push('payment required, add OpenRouter credits');
  const limited = byKind.get('rate_limit');
  if (limited) parts.push(`${limited.length} model(s) rate limited`);
  const missing = byKind.get('not_found');
  if (missing) parts.push(`model(s) not found: ${missing.map((e) => e.model).join(', ')}`);
  const timedOut = byKind.get('timeout');
  if (timedOut) parts.push(`${timedOut.length} model(s) timed out`);
  if (byKind.has('server')) parts.push('OpenRouter server error');
  const unknown = byKind.get('unknown');
  if (unknown) parts.push(`${unknown.length} model(s) failed: ${unknown.map((e) => e.message).join('; ')}`);

  return parts.join('; ');
}
