/**
 * 派发器 — p-queue 限制并发地把请求提交给执行引擎
 * 每个请求只提交一次，失败直接上抛，由 VCS 重投
 */

import PQueue from "p-queue";
import { abortable } from "../lib/deadline.js";
import { CancelledError, isRouterError } from "../router/errors.js";
import type { DispatchAck, DispatchRequest } from "../types/index.js";
import type { EngineClient } from "./engine-client.js";

export class Dispatcher {
  private readonly queue: PQueue;

  constructor(
    private readonly client: EngineClient,
    concurrency: number = 10,
  ) {
    this.queue = new PQueue({ concurrency });
  }

  /**
   * 提交派发请求，引擎受理后返回
   * @throws DispatchError 引擎拒绝或不可达
   * @throws CancelledError 排队或提交期间被取消
   */
  async dispatch(request: DispatchRequest, signal?: AbortSignal): Promise<DispatchAck> {
    if (signal?.aborted) {
      throw new CancelledError("dispatch");
    }
    const task = this.queue.add(() => this.client.submit(request, signal), { signal, throwOnTimeout: true });
    try {
      // 排队中的任务要等出队才检查 signal，这里取消即返回
      return await (signal ? abortable(task, signal) : task);
    } catch (err) {
      if (signal?.aborted && !isRouterError(err)) {
        throw new CancelledError("dispatch");
      }
      throw err;
    }
  }

  /** 等待所有提交完成 */
  async drain(): Promise<void> {
    await this.queue.onIdle();
  }
}
