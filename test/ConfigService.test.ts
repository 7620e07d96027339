import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { AppError, ValidationError } from '../src/Common/Errors.js';
import { GetLogLevel } from '../src/Common/Log.js';
import { ApplyEnvOverrides, ENV_LOG_LEVEL } from '../src/Config.js';
import { EVENT_NAMES } from '../src/Domain/Utility.js';
import { MainEventBus } from '../src/Events/MainEventBus.js';
import { ConfigService } from '../src/Services/ConfigService.js';

async function CatchAppError(promise: Promise<unknown>): Promise<AppError> {
    try {
        await promise;
    } catch(err) {
        if (err instanceof AppError) {
            return err;
        }
        throw err;
    }
    throw new Error('expected the call to fail');
}

function CatchSyncAppError(fn: () => unknown): AppError {
    try {
        fn();
    } catch(err) {
        if (err instanceof AppError) {
            return err;
        }
        throw err;
    }
    throw new Error('expected the call to fail');
}

describe('ConfigService', () => {
    let bus: MainEventBus;
    let service: ConfigService;

    beforeEach(() => {
        bus = new MainEventBus();
        service = new ConfigService(bus);
    });

    describe('Apply', () => {
        it('fills defaults for an empty document', () => {
            const expected = { logLevel: 'info', integerKeyTypes: {}, emitEvents: true };
            expect(service.Apply({})).toEqual(expected);
            expect(service.Apply(null)).toEqual(expected);
        });

        it('applies the configured log level', () => {
            service.Apply({ logLevel: 'warn' });
            expect(GetLogLevel()).toBe('warn');
        });

        it('keeps integer key overrides', () => {
            const config = service.Apply({ integerKeyTypes: { blocksize: 'uint32' }, emitEvents: false });
            expect(config.integerKeyTypes).toEqual({ blocksize: 'uint32' });
            expect(config.emitEvents).toBe(false);
        });

        it('reports every invalid path', () => {
            const error = CatchSyncAppError(() => {
                return service.Apply({ logLevel: 'loud', integerKeyTypes: { blocksize: 'uint128' } });
            });
            expect(error).toBeInstanceOf(ValidationError);
            expect(error.details?.paths).toEqual(['logLevel', 'integerKeyTypes.blocksize']);
        });

        it('announces loaded and rejected documents', () => {
            const loaded: unknown[] = [];
            const rejected: unknown[] = [];
            bus.On(EVENT_NAMES.configLoaded, payload => {
                loaded.push(payload);
            });
            bus.On(EVENT_NAMES.configError, payload => {
                rejected.push(payload);
            });

            service.Apply({ logLevel: 'debug' });
            expect(() => service.Apply({ emitEvents: 'sometimes' })).toThrow(ValidationError);

            expect(loaded).toEqual([{ logLevel: 'debug', integerKeyTypes: {}, emitEvents: true }]);
            expect(rejected).toHaveLength(1);
            expect(rejected[0]).toBeInstanceOf(ValidationError);
        });
    });

    describe('ApplyEnvOverrides', () => {
        it('lets the environment override the log level', () => {
            expect(ApplyEnvOverrides({ logLevel: 'info' }, { [ENV_LOG_LEVEL]: 'debug' })).toEqual({ logLevel: 'debug' });
        });

        it('treats an empty document as an empty object', () => {
            expect(ApplyEnvOverrides(null, {})).toEqual({});
            expect(ApplyEnvOverrides(undefined, { [ENV_LOG_LEVEL]: 'warn' })).toEqual({ logLevel: 'warn' });
        });

        it('passes other documents through for validation to reject', () => {
            expect(ApplyEnvOverrides('text', { [ENV_LOG_LEVEL]: 'warn' })).toBe('text');
        });

        it('does not modify the parsed document', () => {
            const parsed = { logLevel: 'info' };
            ApplyEnvOverrides(parsed, { [ENV_LOG_LEVEL]: 'error' });
            expect(parsed).toEqual({ logLevel: 'info' });
        });
    });

    describe('Load', () => {
        let dir: string;
        let savedLogLevel: string | undefined;

        beforeEach(async () => {
            dir = await mkdtemp(join(tmpdir(), 'lzc-config-'));
            savedLogLevel = process.env[ENV_LOG_LEVEL];
            delete process.env[ENV_LOG_LEVEL];
        });

        afterEach(async () => {
            if (savedLogLevel === undefined) {
                delete process.env[ENV_LOG_LEVEL];
            } else {
                process.env[ENV_LOG_LEVEL] = savedLogLevel;
            }
            await rm(dir, { recursive: true, force: true });
        });

        it('reads JSON documents', async () => {
            const path = join(dir, 'lzc.json');
            await writeFile(path, JSON.stringify({ logLevel: 'warn', integerKeyTypes: { copies: 'uint8' } }));
            const config = await service.Load(path);
            expect(config).toEqual({ logLevel: 'warn', integerKeyTypes: { copies: 'uint8' }, emitEvents: true });
        });

        it('reads YAML documents', async () => {
            const path = join(dir, 'lzc.yaml');
            await writeFile(path, 'logLevel: debug\nemitEvents: false\n');
            const config = await service.Load(path);
            expect(config).toEqual({ logLevel: 'debug', integerKeyTypes: {}, emitEvents: false });
        });

        it('treats a blank YAML file as defaults', async () => {
            const path = join(dir, 'blank.yml');
            await writeFile(path, '');
            expect((await service.Load(path)).logLevel).toBe('info');
        });

        it('applies the environment over the file', async () => {
            const path = join(dir, 'lzc.json');
            await writeFile(path, JSON.stringify({ logLevel: 'warn' }));
            process.env[ENV_LOG_LEVEL] = 'error';
            expect((await service.Load(path)).logLevel).toBe('error');
        });

        it('rejects unsupported extensions', async () => {
            const path = join(dir, 'lzc.toml');
            await writeFile(path, 'logLevel = "info"');
            const error = await CatchAppError(service.Load(path));
            expect(error).toBeInstanceOf(ValidationError);
            expect(error.message).toBe('Unsupported config file format. Use .json or .yaml');
        });

        it('rejects malformed JSON', async () => {
            const path = join(dir, 'broken.json');
            await writeFile(path, '{ "logLevel": ');
            const error = await CatchAppError(service.Load(path));
            expect(error.message).toBe(`Config file '${path}' is not valid JSON`);
        });

        it('wraps a missing file', async () => {
            const path = join(dir, 'missing.json');
            const error = await CatchAppError(service.Load(path));
            expect(error).toBeInstanceOf(ValidationError);
            expect(error.message).toBe(`Failed to load config from '${path}'`);
            expect(error.details).toEqual({ path });
        });
    });
});
