/**
 * Entry point of the client: one connection to a rosbridge server plus the
 * rosapi introspection calls.
 */

import { z } from 'zod';
import { ConnectionManager, type ConnectionManagerOptions } from './bridge/connection-manager.js';
import type { ActionOutcome } from './bridge/dispatcher.js';
import type {
  CallServiceEnvelope,
  CancelActionGoalEnvelope,
  OutboundEnvelope,
  SendActionGoalEnvelope,
} from './bridge/protocol.js';
import type { EventListener } from './core/event-bus.js';
import type { ServiceRequest, ServiceResponse } from './core/message.js';
import { Service } from './core/service.js';
import { ProtocolError } from './errors.js';
import type { ClientConfig } from './utils/config.js';
import { Logger, logger as rootLogger } from './utils/logger.js';

export type RosOptions = ConnectionManagerOptions;

// --- rosapi responses ---

const TopicsSchema = z.object({ topics: z.array(z.string()), types: z.array(z.string()) });
const TopicTypeSchema = z.object({ type: z.string() });
const TopicNamesSchema = z.object({ topics: z.array(z.string()) });
const ServiceNamesSchema = z.object({ services: z.array(z.string()) });
const ServiceTypeSchema = z.object({ type: z.string() });
const NodesSchema = z.object({ nodes: z.array(z.string()) });
const NodeDetailsSchema = z.object({
  subscribing: z.array(z.string()),
  publishing: z.array(z.string()),
  services: z.array(z.string()),
});
const ParamNamesSchema = z.object({ names: z.array(z.string()) });
const ParamValueSchema = z.object({ value: z.string() });
const ActionServersSchema = z.object({ action_servers: z.array(z.string()) });

export const TypeDefSchema = z.object({
  type: z.string(),
  fieldnames: z.array(z.string()),
  fieldtypes: z.array(z.string()),
  fieldarraylen: z.array(z.number()),
  examples: z.array(z.string()),
  constnames: z.array(z.string()).optional(),
  constvalues: z.array(z.string()).optional(),
}).passthrough();

const TypeDefsSchema = z.object({ typedefs: z.array(TypeDefSchema) });

export type TypeDef = z.infer<typeof TypeDefSchema>;
export type NodeDetails = z.infer<typeof NodeDetailsSchema>;

export interface TopicList {
  topics: string[];
  types: string[];
}

export class Ros {
  readonly logger: Logger;
  private readonly connection: ConnectionManager;

  constructor(options: RosOptions = {}) {
    this.logger = options.logger ?? rootLogger;
    this.connection = new ConnectionManager({
      ...options,
      logger: this.logger.child('ConnectionManager'),
    });
  }

  /** Build a client from loaded configuration. */
  static fromConfig(config: ClientConfig, options: Omit<RosOptions, keyof ClientConfig> = {}): Ros {
    const logger = new Logger({ level: config.logLevel, format: config.logFormat });
    return new Ros({
      url: config.url,
      reconnect: config.reconnect,
      reconnectIntervalMs: config.reconnectIntervalMs,
      maxReconnectIntervalMs: config.maxReconnectIntervalMs,
      connectTimeoutMs: config.connectTimeoutMs,
      serviceTimeoutMs: config.serviceTimeoutMs,
      headers: config.headers,
      logger,
      ...options,
    });
  }

  get url(): string {
    return this.connection.url;
  }

  get isConnected(): boolean {
    return this.connection.isConnected;
  }

  get isConnecting(): boolean {
    return this.connection.isConnecting;
  }

  // --- Lifecycle ---

  connect(): void {
    this.connection.connect();
  }

  close(): void {
    this.connection.close();
  }

  run(timeoutMs?: number): Promise<void> {
    return this.connection.run(timeoutMs);
  }

  runForever(): Promise<void> {
    return this.connection.runForever();
  }

  terminate(): void {
    this.connection.terminate();
  }

  onReady(callback: () => void, runInBackground = true): void {
    this.connection.onReady(callback, runInBackground);
  }

  callLater(delayMs: number, callback: () => void): () => void {
    return this.connection.callLater(delayMs, callback);
  }

  // --- Messaging ---

  nextId(): number {
    return this.connection.nextId();
  }

  sendOnReady(envelope: OutboundEnvelope): void {
    this.connection.sendOnReady(envelope);
  }

  callAsyncService(
    envelope: CallServiceEnvelope,
    onSuccess: (response: ServiceResponse) => void,
    onError: (error: unknown) => void
  ): void {
    this.connection.callAsyncService(envelope, onSuccess, onError);
  }

  callSyncService(envelope: CallServiceEnvelope, timeoutMs?: number): Promise<ServiceResponse> {
    return this.connection.callSyncService(envelope, timeoutMs);
  }

  sendActionGoal(
    envelope: SendActionGoalEnvelope,
    resultback: (outcome: ActionOutcome) => void,
    feedback: ((values: unknown) => void) | undefined,
    errback: (error: unknown) => void
  ): void {
    this.connection.sendActionGoal(envelope, resultback, feedback, errback);
  }

  cancelActionGoal(envelope: CancelActionGoalEnvelope): void {
    this.connection.cancelActionGoal(envelope);
  }

  abandonActionGoal(id: string): void {
    this.connection.abandonActionGoal(id);
  }

  /** Ask the bridge to report status messages at `level` and above. */
  setStatusLevel(level: 'none' | 'error' | 'warning' | 'info', id: string): void {
    this.sendOnReady({ op: 'set_level', id, level });
  }

  // --- Events ---

  on(event: string, listener: EventListener): () => void {
    return this.connection.on(event, listener);
  }

  once(event: string, listener: EventListener): () => void {
    return this.connection.once(event, listener);
  }

  off(event: string, listener?: EventListener): void {
    this.connection.off(event, listener);
  }

  emit(event: string, ...args: unknown[]): boolean {
    return this.connection.emit(event, ...args);
  }

  // --- rosapi ---

  async getTopics(): Promise<TopicList> {
    return this.callRosapi('/rosapi/topics', 'rosapi/Topics', {}, TopicsSchema);
  }

  async getTopicType(topic: string): Promise<string> {
    const { type } = await this.callRosapi('/rosapi/topic_type', 'rosapi/TopicType', { topic }, TopicTypeSchema);
    return type;
  }

  async getTopicsForType(topicType: string): Promise<string[]> {
    const { topics } = await this.callRosapi(
      '/rosapi/topics_for_type', 'rosapi/TopicsForType', { type: topicType }, TopicNamesSchema
    );
    return topics;
  }

  async getServices(): Promise<string[]> {
    const { services } = await this.callRosapi('/rosapi/services', 'rosapi/Services', {}, ServiceNamesSchema);
    return services;
  }

  async getServiceType(service: string): Promise<string> {
    const { type } = await this.callRosapi('/rosapi/service_type', 'rosapi/ServiceType', { service }, ServiceTypeSchema);
    return type;
  }

  async getServicesForType(serviceType: string): Promise<string[]> {
    const { services } = await this.callRosapi(
      '/rosapi/services_for_type', 'rosapi/ServicesForType', { type: serviceType }, ServiceNamesSchema
    );
    return services;
  }

  async getNodes(): Promise<string[]> {
    const { nodes } = await this.callRosapi('/rosapi/nodes', 'rosapi/Nodes', {}, NodesSchema);
    return nodes;
  }

  async getNodeDetails(node: string): Promise<NodeDetails> {
    return this.callRosapi('/rosapi/node_details', 'rosapi/NodeDetails', { node }, NodeDetailsSchema);
  }

  /** Names of all parameters on the parameter server. */
  async getParams(): Promise<string[]> {
    const { names } = await this.callRosapi('/rosapi/get_param_names', 'rosapi/GetParamNames', {}, ParamNamesSchema);
    return names;
  }

  /** Raw JSON-encoded value of a parameter; `Param` decodes it. */
  async getParam(name: string, timeoutMs?: number): Promise<string> {
    const { value } = await this.callRosapi(
      '/rosapi/get_param', 'rosapi/GetParam', { name }, ParamValueSchema, timeoutMs
    );
    return value;
  }

  async setParam(name: string, encodedValue: string, timeoutMs?: number): Promise<void> {
    await this.callRosapi(
      '/rosapi/set_param', 'rosapi/SetParam', { name, value: encodedValue }, z.object({}).passthrough(), timeoutMs
    );
  }

  async deleteParam(name: string, timeoutMs?: number): Promise<void> {
    await this.callRosapi(
      '/rosapi/delete_param', 'rosapi/DeleteParam', { name }, z.object({}).passthrough(), timeoutMs
    );
  }

  async getMessageDetails(messageType: string): Promise<TypeDef[]> {
    const { typedefs } = await this.callRosapi(
      '/rosapi/message_details', 'rosapi/MessageDetails', { type: messageType }, TypeDefsSchema
    );
    return typedefs;
  }

  async getServiceRequestDetails(serviceType: string): Promise<TypeDef[]> {
    const { typedefs } = await this.callRosapi(
      '/rosapi/service_request_details', 'rosapi/ServiceRequestDetails', { type: serviceType }, TypeDefsSchema
    );
    return typedefs;
  }

  async getServiceResponseDetails(serviceType: string): Promise<TypeDef[]> {
    const { typedefs } = await this.callRosapi(
      '/rosapi/service_response_details', 'rosapi/ServiceResponseDetails', { type: serviceType }, TypeDefsSchema
    );
    return typedefs;
  }

  async getActionServers(): Promise<string[]> {
    const { action_servers } = await this.callRosapi(
      '/rosapi/action_servers', 'rosapi/GetActionServers', {}, ActionServersSchema
    );
    return action_servers;
  }

  private async callRosapi<T>(
    name: string,
    serviceType: string,
    request: ServiceRequest,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    timeoutMs?: number
  ): Promise<T> {
    const service = new Service(this, name, serviceType, this.logger.child('Service'));
    const response = await service.call(request, timeoutMs);

    const result = schema.safeParse(response);
    if (!result.success) {
      throw new ProtocolError(`Unexpected response from ${name}: ${result.error.issues[0]?.message ?? 'invalid'}`);
    }
    return result.data;
  }
}
