// src/shared/utils/validation.util.ts
import { z } from 'zod';
import { ValidationException } from '../exceptions/validation.exception';

export class ValidationUtil {
    /**
     * Parses data with a zod schema, converting issues into a ValidationException
     */
    static validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, message = 'Invalid input'): T {
        const parsed = schema.safeParse(data);
        if (parsed.success) {
            return parsed.data;
        }

        const validationErrors = parsed.error.errors.map(issue => ({
            field: issue.path.join('.') || '(root)',
            message: issue.message
        }));

        throw new ValidationException(message, validationErrors);
    }
}
