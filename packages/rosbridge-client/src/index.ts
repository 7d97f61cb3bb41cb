/**
 * rosbridge-client: talk to ROS over a rosbridge WebSocket server.
 */

export { Ros, TypeDefSchema, type RosOptions, type TypeDef, type NodeDetails, type TopicList } from './ros.js';

export { Topic, type TopicOptions, type Compression, type MessageCallback } from './core/topic.js';
export {
  Service,
  type ServiceHandler,
  type ServiceCallback,
  type ServiceErrback,
} from './core/service.js';
export { Param, type ParamCallback, type ParamErrback } from './core/param.js';
export {
  Action,
  ActionGoalStatus,
  actionGoalStatusName,
  type ActionGoalStatusName,
  type ActionGoalStatusCode,
  type ActionOutcome,
  type SendGoalOptions,
} from './core/action.js';
export { EventBus, type EventListener } from './core/event-bus.js';
export {
  createHeader,
  isMessage,
  type Message,
  type ServiceRequest,
  type ServiceResponse,
  type HeaderOptions,
} from './core/message.js';
export { Time, type Stamp } from './core/time.js';

export { Goal } from './actionlib/goal.js';
export { ActionClient, type ActionClientOptions } from './actionlib/action-client.js';
export { SimpleActionServer, type ExecuteCallback } from './actionlib/simple-action-server.js';
export {
  GoalStatus,
  isActiveStatus,
  type GoalStatusCode,
  type GoalStatusMessage,
  type GoalIdMessage,
  type ActionGoalMessage,
} from './actionlib/goal-status.js';

export { TFClient, type TFClientOptions, type Transform, type TransformCallback } from './tf/tf-client.js';

export {
  ConnectionManager,
  type ConnectionManagerOptions,
  type CloseEvent,
} from './bridge/connection-manager.js';
export { CorrelationTable, type PendingCompletion, type ReplyOutcome } from './bridge/correlation-table.js';
export {
  WebSocketTransport,
  createWebSocketTransport,
  type BridgeTransport,
  type TransportFactory,
  type TransportHandlers,
  type TransportOptions,
} from './bridge/ws-client.js';
export { Op, type OpValue, type Envelope, type InboundEnvelope, type OutboundEnvelope } from './bridge/protocol.js';

export * from './errors.js';
export { loadClientConfig, createUrl, ClientConfigSchema, type ClientConfig } from './utils/config.js';
export { Logger, logger, type LogLevel, type LoggerOptions, type LogOutput } from './utils/logger.js';
