/**
 * Signal that fires after `timeoutMs` or when `parent` aborts, whichever
 * comes first.
 */
export function timeoutSignal(timeoutMs: number, parent?: AbortSignal): AbortSignal {
  const timeout = AbortSignal.timeout(timeoutMs);
  return parent ? AbortSignal.any([timeout, parent]) : timeout;
}
