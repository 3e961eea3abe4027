// src/core/domain/events/base-domain.event.ts
import { v4 as uuidv4 } from 'uuid';

export abstract class BaseDomainEvent<TPayload extends { actorId: string } = { actorId: string }> {
    public readonly occurredOn: Date;
    public readonly eventId: string;
    public readonly eventVersion: number;

    constructor(
        public readonly aggregateId: string,
        public readonly eventType: string,
        public readonly aggregateType: string,
        protected readonly payload: TPayload,
        eventVersion: number = 1
    ) {
        this.occurredOn = new Date();
        this.eventId = uuidv4();
        this.eventVersion = eventVersion;
    }

    get actorId(): string {
        return this.payload.actorId;
    }

    getPayload(): TPayload {
        return { ...this.payload };
    }

    toJSON() {
        return {
            eventId: this.eventId,
            eventType: this.eventType,
            aggregateId: this.aggregateId,
            aggregateType: this.aggregateType,
            eventVersion: this.eventVersion,
            actorId: this.actorId,
            occurredOn: this.occurredOn.toISOString(),
            data: this.getPayload()
        };
    }
}
