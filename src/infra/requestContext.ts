import { AsyncLocalStorage } from "node:async_hooks";

/** Correlation data attached to every log entry emitted while serving a tool call. */
export interface RequestContext {
  readonly requestId: string | number | null;
  readonly tool: string;
}

const storage = new AsyncLocalStorage<RequestContext>();

/** Runs {@link callback} with {@link context} visible to nested async work. */
export function runWithRequestContext<T>(context: RequestContext, callback: () => T): T {
  return storage.run(context, callback);
}

export function getRequestContext(): RequestContext | undefined {
  return storage.getStore();
}
