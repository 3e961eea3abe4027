// src/shared/types/common.types.ts

/** Calendar date in `YYYY-MM-DD` form. Statement and transaction dates carry no time zone. */
export type IsoDate = string;

export interface PaginationOptions {
    page: number;
    pageSize: number;
}

export interface PaginatedResult<T> {
    data: T[];
    pagination: {
        total: number;
        page: number;
        pageSize: number;
        totalPages: number;
        hasNext: boolean;
        hasPrev: boolean;
    };
}

export interface ApiResponse<T> {
    success: boolean;
    data?: T;
    error?: {
        kind: string;
        code: string;
        message: string;
        details: Record<string, unknown>;
    };
    meta: {
        timestamp: string;
    };
}

export function buildPagination(total: number, options: PaginationOptions): PaginatedResult<never>['pagination'] {
    const totalPages = total === 0 ? 0 : Math.ceil(total / options.pageSize);
    return {
        total,
        page: options.page,
        pageSize: options.pageSize,
        totalPages,
        hasNext: options.page < totalPages,
        hasPrev: options.page > 1
    };
}
