// src/core/application/handlers/event-dispatcher.service.ts
import { BaseDomainEvent } from '../../domain/events/base-domain.event';
import { IEventHandler } from './base-event.handler';
import { logger } from '../../../infrastructure/monitoring/logger.service';

export class EventDispatcher {
    private handlers: IEventHandler[] = [];

    register(handler: IEventHandler): void {
        this.handlers.push(handler);
        logger.info('Event handler registered', {
            handlerName: handler.constructor.name
        });
    }

    async dispatch(event: BaseDomainEvent): Promise<void> {
        const applicableHandlers = this.handlers.filter(handler => handler.canHandle(event));

        if (applicableHandlers.length === 0) {
            logger.debug('No handlers found for event', {
                eventType: event.eventType,
                eventId: event.eventId
            });
            return;
        }

        const promises = applicableHandlers.map(async (handler) => {
            try {
                await handler.handle(event);
            } catch (error) {
                logger.error('Event handler failed', error instanceof Error ? error : new Error(String(error)), {
                    eventType: event.eventType,
                    eventId: event.eventId,
                    handlerName: handler.constructor.name
                });
                // Don't rethrow - one handler failure must not break the others or the committed operation
            }
        });

        await Promise.all(promises);
    }

    async dispatchBatch(events: BaseDomainEvent[]): Promise<void> {
        if (events.length === 0) {
            return;
        }

        logger.event('Dispatching event batch', {
            eventCount: events.length,
            eventTypes: events.map(e => e.eventType)
        });

        // Preserve the order in which the events were raised
        for (const event of events) {
            await this.dispatch(event);
        }
    }

    getRegisteredHandlers(): IEventHandler[] {
        return [...this.handlers];
    }

    clear(): void {
        this.handlers = [];
    }
}

// Singleton instance
export const eventDispatcher = new EventDispatcher();
