import { assign, setup, type SnapshotFrom } from "xstate";
import type { ToolCallStatus } from "../types/index.js";

export interface ToolCallMachineContext {
  /** 已拼接的参数文本 */
  accumulatedArgs: string;
  /** 解析成功后的参数对象 */
  parsedArgs?: Record<string, unknown>;
  /** 解析失败时的诊断信息 */
  errorMessage?: string;
}

export type ToolCallMachineEvent =
  | { type: "ARGS.PARTIAL"; fragment: string }
  | { type: "ARGS.PARSED"; fragment: string; args: Record<string, unknown> }
  | { type: "ARGS.INVALID"; fragment: string; reason: string };

/**
 * 单个工具调用参数的构建状态机：
 * initializing -> streaming -> completed | error，completed/error 为终态。
 * 终态不再响应任何事件，保证状态只前进不回退。
 */
export const toolCallMachine = setup({
  types: {} as {
    context: ToolCallMachineContext;
    events: ToolCallMachineEvent;
  },
  actions: {
    applyFragment: assign(({ context, event }) => ({
      accumulatedArgs: context.accumulatedArgs + event.fragment,
      ...(event.type === "ARGS.PARSED" ? { parsedArgs: event.args } : {}),
      ...(event.type === "ARGS.INVALID" ? { errorMessage: event.reason } : {}),
    })),
  },
}).createMachine({
  id: "toolCallArguments",
  initial: "initializing",
  context: { accumulatedArgs: "" },
  states: {
    initializing: {
      on: {
        "ARGS.PARTIAL": { target: "streaming", actions: "applyFragment" },
        "ARGS.PARSED": { target: "completed", actions: "applyFragment" },
        "ARGS.INVALID": { target: "error", actions: "applyFragment" },
      },
    },
    streaming: {
      on: {
        "ARGS.PARTIAL": { actions: "applyFragment" },
        "ARGS.PARSED": { target: "completed", actions: "applyFragment" },
        "ARGS.INVALID": { target: "error", actions: "applyFragment" },
      },
    },
    completed: { type: "final" },
    error: { type: "final" },
  },
});

export type ToolCallMachineSnapshot = SnapshotFrom<typeof toolCallMachine>;

export function toolCallStatusOf(snapshot: ToolCallMachineSnapshot): ToolCallStatus {
  if (snapshot.matches("completed")) return "completed";
  if (snapshot.matches("error")) return "error";
  if (snapshot.matches("streaming")) return "streaming";
  return "initializing";
}
