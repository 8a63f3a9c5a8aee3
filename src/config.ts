import Ajv, { JSONSchemaType } from 'ajv';
import path from 'path';
import fs from 'fs/promises';
import { existsSync } from 'fs';
import { DataDir } from './constants';
import { ValidationError } from './errors';

const schema: JSONSchemaType<Settings> = {
    type: 'object',
    properties: {
        'v2ray.config': {
            type: 'string',
            default: path.join(DataDir, 'config.json'),
        },
        'v2ray.log.level': {
            type: 'string',
            enum: ['debug', 'info', 'warning', 'error', 'none'],
            default: 'warning',
        },
        'socks.port': {
            type: 'integer',
            minimum: 1,
            maximum: 65535,
            default: 1080,
        },
        'http.port': {
            type: 'integer',
            minimum: 1,
            maximum: 65535,
            default: 1081,
        },
        sniffing: {
            type: 'boolean',
            default: true,
        },
        'routing.rebuild': {
            type: 'boolean',
            default: true,
        },
        'routing.geoip': {
            type: 'boolean',
            default: true,
        },
        'direct.domains': {
            type: 'array',
            items: {
                type: 'string',
                minLength: 1,
            },
            default: [],
        },
        'log.level': {
            type: 'string',
            default: 'info',
        },
    },
    required: [
        'v2ray.config',
        'v2ray.log.level',
        'socks.port',
        'http.port',
        'sniffing',
        'routing.rebuild',
        'routing.geoip',
        'direct.domains',
        'log.level',
    ],
};

const validate = new Ajv({
    useDefaults: true,
    removeAdditional: true,
    coerceTypes: true,
}).compile(schema);

function check(data: unknown): Settings {
    if (!validate(data)) {
        throw new ValidationError(
            (validate.errors || []).map(
                (err) => `${err.instancePath || '/'} ${err.message}`
            )
        );
    }
    return data;
}

let config: Settings = check({});

let cfgfile = path.join(DataDir, 'raylink.json');

export async function saveConfig() {
    await fs.mkdir(path.dirname(cfgfile), { recursive: true });
    await fs.writeFile(cfgfile, JSON.stringify(config, null, 2));
}

export async function loadConfig(file = cfgfile) {
    cfgfile = file;
    if (existsSync(cfgfile)) {
        const content = (await fs.readFile(cfgfile)).toString();
        config = check(JSON.parse(content));
    } else {
        config = check({});
        await saveConfig();
    }
}

export function getConfig<K extends keyof Settings>(key: K): Settings[K] {
    return config[key];
}

export async function setConfig<K extends keyof Settings>(
    key: K,
    value: Settings[K]
) {
    config[key] = value;
    await saveConfig();
}
