// test/unit/server.test.ts
type Listener = (...args: unknown[]) => void;

jest.mock('@/infrastructure/database/connections', () => ({
    // Startup stays pending so only the process handlers are exercised.
    connectPostgreSQL: jest.fn(() => new Promise(() => undefined)),
    disconnectPostgreSQL: jest.fn()
}));

jest.mock('@/infrastructure/monitoring/logger.service', () => ({
    logger: {
        info: jest.fn(),
        warn: jest.fn(),
        error: jest.fn(),
        fatal: jest.fn(),
        flush: jest.fn()
    }
}));

describe('server process handlers', () => {
    let handlers: Map<string, Listener>;
    let exit: jest.SpyInstance;

    const flush = () => new Promise(resolve => setImmediate(resolve));

    beforeEach(() => {
        handlers = new Map();
        jest.spyOn(process, 'on').mockImplementation(((event: string, listener: Listener) => {
            handlers.set(event, listener);
            return process;
        }) as any);
        exit = jest.spyOn(process, 'exit').mockImplementation((() => undefined) as any);

        jest.isolateModules(() => {
            require('@/server');
        });
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('exits cleanly on SIGTERM', async () => {
        handlers.get('SIGTERM')?.();
        await flush();

        expect(exit).toHaveBeenCalledWith(0);
    });

    it('exits with a failure code after an uncaught exception', async () => {
        handlers.get('uncaughtException')?.(new Error('boom'));
        await flush();

        expect(exit).toHaveBeenCalledWith(1);
    });

    it('exits with a failure code after an unhandled rejection', async () => {
        handlers.get('unhandledRejection')?.(new Error('lost promise'));
        await flush();

        expect(exit).toHaveBeenCalledWith(1);
    });
});
