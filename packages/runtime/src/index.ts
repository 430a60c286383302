export * from './types/index.js';
export * from './errors/streamErrors.js';
export * from './config/streamingConfig.js';
export * from './namespace/namespaceResolver.js';
export * from './event/EventBus.js';
export * from './event/eventFactory.js';
export * from './event/summarizeEvent.js';
export * from './tools/argumentParsing.js';
export * from './tools/ToolCallTracker.js';
export * from './fsm/toolCallMachine.js';
export * from './messages/TokenAccumulator.js';
export * from './messages/MessageReconciler.js';
export * from './messages/TokenStreamHandler.js';
export * from './channels/ChannelMonitor.js';
export * from './core/FrameDispatcher.js';
export * from './core/StreamSession.js';
export * from './core/ChannelStreamProcessor.js';
export * from './factories/processorFactories.js';
export * from './utils/logger.js';
export * from './utils/values.js';
