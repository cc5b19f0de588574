import { describe, expect, it, vi } from "vitest";
import { Dispatcher } from "../../src/dispatch/dispatcher.js";
import type { EngineClient } from "../../src/dispatch/engine-client.js";
import { CancelledError, DispatchError } from "../../src/router/errors.js";
import type { DispatchAck, DispatchRequest } from "../../src/types/index.js";

const REQUEST: DispatchRequest = {
  target: "svc-a-build-42",
  parameters: { "extensions.target": "svc-a-build-42" },
  labels: { resource: "svc-a", category: "build", branch: "main" },
};

const ACK: DispatchAck = { token: "run-001", acceptedAt: "2026-01-01T00:00:00.000Z" };

describe("Dispatcher", () => {
  it("每个请求只提交一次", async () => {
    const submit = vi.fn(async (_request: DispatchRequest, _signal?: AbortSignal) => ACK);
    const dispatcher = new Dispatcher({ submit });

    await expect(dispatcher.dispatch(REQUEST)).resolves.toEqual(ACK);
    expect(submit).toHaveBeenCalledTimes(1);
    expect(submit.mock.calls[0][0]).toBe(REQUEST);
  });

  it("失败直接上抛，不重试", async () => {
    const submit = vi.fn(async (): Promise<DispatchAck> => {
      throw new DispatchError("Unreachable", "执行引擎不可达: ECONNREFUSED");
    });
    const dispatcher = new Dispatcher({ submit });

    await expect(dispatcher.dispatch(REQUEST)).rejects.toBeInstanceOf(DispatchError);
    expect(submit).toHaveBeenCalledTimes(1);
  });

  it("已取消的请求不会提交", async () => {
    const submit = vi.fn(async () => ACK);
    const dispatcher = new Dispatcher({ submit });
    const controller = new AbortController();
    controller.abort();

    await expect(dispatcher.dispatch(REQUEST, controller.signal)).rejects.toBeInstanceOf(CancelledError);
    expect(submit).not.toHaveBeenCalled();
  });

  it("排队期间取消时立即返回，不等待前一个请求完成", async () => {
    const submit = vi.fn(
      (_request: DispatchRequest, _signal?: AbortSignal) => new Promise<DispatchAck>(() => undefined),
    );
    const dispatcher = new Dispatcher({ submit }, 1);

    void dispatcher.dispatch(REQUEST).catch(() => undefined);
    const controller = new AbortController();
    const second = dispatcher.dispatch(REQUEST, controller.signal);

    controller.abort();

    await expect(second).rejects.toBeInstanceOf(CancelledError);
    expect(submit).toHaveBeenCalledTimes(1);
  });

  it("出队后不会提交已取消的请求", async () => {
    let release: (ack: DispatchAck) => void = () => undefined;
    const submit = vi.fn(
      (_request: DispatchRequest, _signal?: AbortSignal) =>
        new Promise<DispatchAck>((resolve) => {
          release = resolve;
        }),
    );
    const dispatcher = new Dispatcher({ submit }, 1);

    const first = dispatcher.dispatch(REQUEST);
    const controller = new AbortController();
    const second = dispatcher.dispatch(REQUEST, controller.signal);
    controller.abort();
    await expect(second).rejects.toBeInstanceOf(CancelledError);

    release(ACK);
    await expect(first).resolves.toEqual(ACK);
    await dispatcher.drain();
    expect(submit).toHaveBeenCalledTimes(1);
  });

  it("限制并发提交数", async () => {
    let active = 0;
    let peak = 0;
    const client: EngineClient = {
      submit: async () => {
        active++;
        peak = Math.max(peak, active);
        await new Promise((resolve) => setTimeout(resolve, 5));
        active--;
        return ACK;
      },
    };
    const dispatcher = new Dispatcher(client, 2);

    await Promise.all(Array.from({ length: 6 }, () => dispatcher.dispatch(REQUEST)));
    expect(peak).toBe(2);
  });
});
