import { randomUUID } from "crypto";
import { AsyncLocalStorage } from "async_hooks";

export type RequestActor = "citizen" | "authority";

type ContextStore = {
  requestId: string;
  actor?: RequestActor;
};

const storage = new AsyncLocalStorage<ContextStore>();

export function withRequestContext<T>(
  fn: () => T,
  requestId?: string,
): T {
  return storage.run(
    {
      requestId: requestId ?? randomUUID(),
    },
    fn,
  );
}

/** Tags the current request; no-op outside a request context. */
export function setRequestActor(actor: RequestActor): void {
  const store = storage.getStore();
  if (store) store.actor = actor;
}

export function getRequestContext(): Readonly<ContextStore> | undefined {
  return storage.getStore();
}
