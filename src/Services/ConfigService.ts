import Joi from 'joi';
import { AppError, ValidationError } from '../Common/Errors.js';
import { log, SetLogLevel } from '../Common/Log.js';
import { LoadConfig } from '../Config.js';
import { EVENT_NAMES } from '../Domain/Utility.js';
import { MAIN_EVENT_BUS, type MainEventBus } from '../Events/MainEventBus.js';
import { INTEGER_KINDS } from '../Nvlist/TypeRegistry.js';
import type { ValidatedConfig } from '../Types/Config.js';

const FROM = log.Helper_LocationBuilder(`Services`, `ConfigService`);

const CONFIG_SCHEMA = Joi.object<ValidatedConfig>({
    logLevel: Joi.string().valid(`debug`, `info`, `warn`, `error`).default(`info`),
    integerKeyTypes: Joi.object()
        .pattern(Joi.string(), Joi.string().valid(...INTEGER_KINDS))
        .default({}),
    emitEvents: Joi.boolean().default(true),
}).unknown(true);

/**
 * Service responsible for loading and validating library configuration.
 */
export class ConfigService {
    /** Event bus for emitting config-related events */
    private _eventBus: MainEventBus;

    /**
     * Constructs a ConfigService.
     * @param eventBus MainEventBus - Event bus used for emitting `config.loaded` / `config.error`.
     */
    constructor(eventBus: MainEventBus = MAIN_EVENT_BUS) {
        this._eventBus = eventBus;
    }

    /**
     * Loads and validates the configuration from a JSON or YAML file, then applies the log level.
     * @param path string - Filesystem path to the config file. Example: './config/lzc.yaml'
     * @returns Promise<ValidatedConfig> - The validated config object.
     * @throws ValidationError if loading or validation fails.
     * @example
     * const configService = new ConfigService();
     * const config = await configService.Load('./config/lzc.yaml');
     */
    public async Load(path: string): Promise<ValidatedConfig> {
        let rawConfig: unknown;
        try {
            rawConfig = await LoadConfig(path);
        } catch(err) {
            if (err instanceof AppError) {
                throw err;
            }
            throw new ValidationError(`Failed to load config from '${path}'`, { path }, err);
        }
        return this.Apply(rawConfig);
    }

    /**
     * Validates an in-memory configuration document, applies it, and announces it.
     * @param rawConfig unknown - Document to validate; null and undefined count as empty
     * @example
     * const config = new ConfigService().Apply({ logLevel: 'warn' });
     */
    public Apply(rawConfig: unknown): ValidatedConfig {
        const { value, error } = CONFIG_SCHEMA.validate(rawConfig ?? {}, { abortEarly: false });
        if (error) {
            const failure = new ValidationError(
                `Config validation error: ${error.message}`,
                {
                    paths: error.details.map(detail => {
                        return detail.path.join(`.`);
                    }),
                },
                error,
            );
            log.error(failure.message, FROM);
            this._eventBus.Emit(EVENT_NAMES.configError, failure);
            throw failure;
        }
        const validated: ValidatedConfig = {
            logLevel: value.logLevel,
            integerKeyTypes: { ...value.integerKeyTypes },
            emitEvents: value.emitEvents,
        };
        SetLogLevel(validated.logLevel);
        log.info(`Configuration loaded`, FROM, `logLevel=${validated.logLevel}`);
        this._eventBus.Emit(EVENT_NAMES.configLoaded, validated);
        return validated;
    }
}
