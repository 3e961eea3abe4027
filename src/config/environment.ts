import { z } from 'zod';
import { ConfigurationException } from '../shared/exceptions/infrastructure.exception';

const booleanString = z.enum(['true', 'false']).transform(val => val === 'true');
const integerString = z.string().regex(/^\d+$/, 'must be an integer').transform(val => parseInt(val, 10));

const environmentSchema = z.object({
    // Application
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    HOST: z.string().default('0.0.0.0'),
    PORT: integerString.default('3333'),

    // Database - PostgreSQL
    POSTGRES_HOST: z.string().default('localhost'),
    POSTGRES_PORT: integerString.default('5432'),
    POSTGRES_DB: z.string().default('bank_reconciliation'),
    POSTGRES_USER: z.string().default('postgres'),
    POSTGRES_PASSWORD: z.string().default(''),
    POSTGRES_SSL: booleanString.default('false'),
    POSTGRES_MAX_CONNECTIONS: integerString.default('20'),
    POSTGRES_STATEMENT_TIMEOUT: integerString.default('30000'),

    // Logging
    LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),

    // Reconciliation
    RECONCILIATION_TOLERANCE: z.string()
        .regex(/^\d+(\.\d{1,2})?$/, 'must be a non-negative amount with at most 2 decimals')
        .transform(val => parseFloat(val))
        .default('0.01'),
    HISTORY_MAX_PAGE_SIZE: integerString.default('100')
});

export type Environment = z.infer<typeof environmentSchema>;

export function parseEnvironment(source: NodeJS.ProcessEnv): Environment {
    const parsed = environmentSchema.safeParse(source);
    if (!parsed.success) {
        const issues = parsed.error.errors.map(issue => `${issue.path.join('.')}: ${issue.message}`);
        throw new ConfigurationException(`Invalid configuration: ${issues.join('; ')}`, { issues });
    }
    return parsed.data;
}

class ConfigService {
    private static instance: ConfigService | undefined;
    private readonly config: Environment;

    private constructor() {
        this.config = parseEnvironment(process.env);
    }

    static getInstance(): ConfigService {
        if (!ConfigService.instance) {
            ConfigService.instance = new ConfigService();
        }
        return ConfigService.instance;
    }

    getAll(): Environment {
        return { ...this.config };
    }
}

export { ConfigService };
