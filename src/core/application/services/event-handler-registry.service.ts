// src/core/application/services/event-handler-registry.service.ts
import { EventDispatcher, eventDispatcher } from '../handlers/event-dispatcher.service';
import { ReconciliationAuditHandler } from '../handlers/reconciliation-audit.handler';
import { logger } from '../../../infrastructure/monitoring/logger.service';

export class EventHandlerRegistry {
    private static initialized = false;

    static initialize(dispatcher: EventDispatcher = eventDispatcher): void {
        if (this.initialized) {
            logger.warn('Event handlers already initialized');
            return;
        }

        dispatcher.register(new ReconciliationAuditHandler());

        this.initialized = true;

        const registeredHandlers = dispatcher.getRegisteredHandlers();
        logger.info('Event handlers initialized successfully', {
            handlerCount: registeredHandlers.length,
            handlers: registeredHandlers.map(h => h.constructor.name)
        });
    }

    static isInitialized(): boolean {
        return this.initialized;
    }

    static reset(dispatcher: EventDispatcher = eventDispatcher): void {
        dispatcher.clear();
        this.initialized = false;
    }
}
