import { ConfigurationError } from "../errors/streamErrors.js";
import { StreamingConfigSchema } from "../types/index.js";
import type {
  ChannelConfig,
  ChannelMode,
  StreamMode,
  StreamingConfig,
  StreamingConfigInput,
} from "../types/index.js";

/**
 * 校验并规范化订阅配置；任何非法输入都在构造阶段以 ConfigurationError 抛出。
 */
export function createStreamingConfig(
  input: StreamingConfigInput = {}
): StreamingConfig {
  const parsed = StreamingConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(parsed.error.issues);
  }
  return parsed.data;
}

export function effectiveChannelMode(
  channel: ChannelConfig,
  preferUpdates: boolean
): ChannelMode {
  return channel.mode ?? (preferUpdates ? "updates" : "values");
}

/**
 * 推导需要向引擎请求的流模式：各通道的有效模式，加上 token 流所需的 messages。
 */
export function determineStreamModes(config: StreamingConfig): StreamMode[] {
  const modes = new Set<StreamMode>();
  for (const channel of config.channels) {
    modes.add(effectiveChannelMode(channel, config.preferUpdates));
  }
  if (config.tokenStreaming.enabledNamespaces.size > 0) {
    modes.add("messages");
  }
  return Array.from(modes);
}
