/**
 * 截止时间 — 把超时和上游取消合并为一个 AbortSignal 传给下游调用
 */

export interface Deadline {
  readonly signal: AbortSignal;
  /** 是否因超时而中止（区别于上游取消） */
  expired(): boolean;
  /** 是否因上游取消而中止 */
  cancelled(): boolean;
  /** 清理定时器和监听器，调用方必须在 finally 中执行 */
  dispose(): void;
}

export function createDeadline(timeoutMs: number, parent?: AbortSignal): Deadline {
  const controller = new AbortController();
  let timedOut = false;

  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort(new Error(`deadline of ${timeoutMs}ms exceeded`));
  }, timeoutMs);

  const onParentAbort = () => controller.abort(parent?.reason);
  if (parent?.aborted) {
    clearTimeout(timer);
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener("abort", onParentAbort, { once: true });
  }

  return {
    signal: controller.signal,
    expired: () => timedOut,
    cancelled: () => !timedOut && parent?.aborted === true,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
    },
  };
}

/**
 * 等待 promise，signal 中止时立即拒绝
 * 保证下游即使忽略 signal，调用方也不会无限等待
 */
export function abortable<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(toError(signal.reason));
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener("abort", onAbort, { once: true });
    }
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      },
    );
  });
}

function toError(reason: unknown): Error {
  return reason instanceof Error ? reason : new Error(String(reason ?? "aborted"));
}
