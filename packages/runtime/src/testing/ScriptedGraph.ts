import type { GraphStreamOptions, StreamableGraph } from "../types/index.js";

export interface ScriptedGraphCall {
  input: unknown;
  options: GraphStreamOptions;
}

/**
 * 进程内的图替身：按顺序回放预先编排的原始帧，并记录每次调用的参数。
 * 传入函数时可以根据调用参数动态生成帧序列。
 */
export class ScriptedGraph implements StreamableGraph {
  public readonly calls: ScriptedGraphCall[] = [];

  private readonly script: unknown[] | ((call: ScriptedGraphCall) => unknown[]);

  constructor(script: unknown[] | ((call: ScriptedGraphCall) => unknown[])) {
    this.script = script;
  }

  public async stream(
    input: unknown,
    options: GraphStreamOptions
  ): Promise<AsyncIterable<unknown>> {
    const call = { input, options };
    this.calls.push(call);
    const frames = typeof this.script === "function" ? this.script(call) : this.script;
    return replay(frames);
  }
}

async function* replay(frames: unknown[]): AsyncGenerator<unknown> {
  for (const frame of frames) {
    yield frame;
  }
}
