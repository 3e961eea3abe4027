// src/core/application/handlers/base-event.handler.ts
import { BaseDomainEvent } from '../../domain/events/base-domain.event';

export interface IEventHandler<TEvent extends BaseDomainEvent = BaseDomainEvent> {
    canHandle(event: BaseDomainEvent): event is TEvent;
    handle(event: TEvent): Promise<void>;
}
