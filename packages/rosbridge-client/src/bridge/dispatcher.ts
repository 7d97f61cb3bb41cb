/**
 * Routes validated inbound envelopes to the event bus or to the correlation
 * tables, by operation.
 */

import type { EventBus } from '../core/event-bus.js';
import { isMessage, type ServiceResponse } from '../core/message.js';
import { actionGoalStatusName, type ActionGoalStatusName } from '../core/action-status.js';
import type { Logger } from '../utils/logger.js';
import type { CorrelationTable } from './correlation-table.js';
import type { InboundEnvelope, StatusMessage } from './protocol.js';

export interface ActionOutcome {
  status: ActionGoalStatusName;
  values: unknown;
}

export type ServiceTable = CorrelationTable<ServiceResponse, unknown>;
export type ActionTable = CorrelationTable<ActionOutcome, unknown, unknown>;

export interface DispatchTargets {
  events: EventBus;
  services: ServiceTable;
  actions: ActionTable;
  logger: Logger;
}

export class Dispatcher {
  constructor(private targets: DispatchTargets) {}

  /**
   * Deliver one envelope. Errors from the correlation tables (unmatched
   * replies) propagate to the caller, which decides how to report them.
   */
  dispatch(envelope: InboundEnvelope): void {
    const { events, services, actions, logger } = this.targets;

    switch (envelope.op) {
      case 'publish':
        events.emit(envelope.topic, envelope.msg);
        return;

      case 'service_response': {
        const delivered = services.resolve(
          envelope.id,
          envelope.result === false
            ? { isError: true, payload: envelope.values }
            : { isError: false, payload: isMessage(envelope.values) ? envelope.values : {} }
        );
        if (!delivered) {
          logger.debug('Discarded late service response', { id: envelope.id, service: envelope.service });
        }
        return;
      }

      case 'call_service':
        events.emit(envelope.service, envelope);
        return;

      case 'action_feedback':
        if (!actions.progress(envelope.id, envelope.values)) {
          logger.debug('Skipped feedback for unknown goal', { id: envelope.id, action: envelope.action });
        }
        return;

      case 'action_result': {
        const outcome: ActionOutcome = {
          status: actionGoalStatusName(envelope.status),
          values: envelope.values,
        };
        const delivered = actions.resolve(
          envelope.id,
          envelope.result === false
            ? { isError: true, payload: outcome }
            : { isError: false, payload: outcome }
        );
        if (!delivered) {
          logger.debug('Discarded late action result', { id: envelope.id, action: envelope.action });
        }
        return;
      }

      case 'status':
        this.logStatus(envelope);
        events.emit('status', envelope);
        return;

      default: {
        const unreachable: never = envelope;
        throw new Error(`Unhandled envelope: ${JSON.stringify(unreachable)}`);
      }
    }
  }

  private logStatus(envelope: StatusMessage): void {
    const { logger } = this.targets;
    const text = `Bridge status: ${envelope.msg ?? ''}`;
    const data = envelope.id === undefined ? undefined : { id: envelope.id };

    switch (envelope.level) {
      case 'error':
        logger.error(text, data);
        break;
      case 'warning':
        logger.warn(text, data);
        break;
      case 'info':
        logger.info(text, data);
        break;
      default:
        logger.debug(text, data);
    }
  }
}
