import { AsyncLocalStorage } from 'async_hooks';

export type RequestContext = {
  submissionId: string;
  userId: number;
  chatId: string;
  startAtMs: number;
};

const als = new AsyncLocalStorage<RequestContext>();

export function runWithRequestContext<T>(ctx: RequestContext, fn: () => T): T {
  return als.run(ctx, fn);
}

export function getRequestContext(): RequestContext | undefined {
  return als.getStore();
}
