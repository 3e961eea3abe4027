// src/shared/types/date.util.ts
import { IsoDate } from './common.types';

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export class DateUtil {
    static isValidIsoDate(value: string): boolean {
        const match = ISO_DATE_PATTERN.exec(value);
        if (!match) return false;

        const [, year, month, day] = match.map(Number);
        const date = new Date(Date.UTC(year, month - 1, day));
        return date.getUTCFullYear() === year
            && date.getUTCMonth() === month - 1
            && date.getUTCDate() === day;
    }

    /**
     * ISO dates compare correctly as strings once validated.
     */
    static isOnOrBefore(date: IsoDate, limit: IsoDate): boolean {
        return date <= limit;
    }

    static toIsoDate(date: Date): IsoDate {
        return date.toISOString().slice(0, 10);
    }
}
