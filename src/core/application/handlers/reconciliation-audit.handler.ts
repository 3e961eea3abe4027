// src/core/application/handlers/reconciliation-audit.handler.ts
import { IEventHandler } from './base-event.handler';
import { BaseDomainEvent } from '../../domain/events/base-domain.event';
import { logger, LoggerService } from '../../../infrastructure/monitoring/logger.service';

/**
 * Writes one audit line per committed reconciliation event.
 */
export class ReconciliationAuditHandler implements IEventHandler {
    constructor(private readonly auditLogger: Pick<LoggerService, 'audit'> = logger) {}

    canHandle(event: BaseDomainEvent): event is BaseDomainEvent {
        return event.aggregateType === 'Reconciliation';
    }

    async handle(event: BaseDomainEvent): Promise<void> {
        this.auditLogger.audit(event.eventType, `Reconciliation:${event.aggregateId}`, event.actorId, {
            eventId: event.eventId,
            occurredOn: event.occurredOn.toISOString(),
            data: event.getPayload()
        });
    }
}
