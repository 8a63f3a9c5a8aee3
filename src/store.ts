import Ajv from 'ajv';
import fs from 'fs/promises';
import { existsSync } from 'fs';
import path from 'path';
import logger from './logger';
import { MalformedPayloadError, ValidationError } from './errors';
import { ConfigSynthesizer, defaultConfig } from './v2ray';

const stringList = { type: 'array', items: { type: 'string' } };

const schema = {
    type: 'object',
    properties: {
        log: {
            type: 'object',
            properties: {
                loglevel: {
                    type: 'string',
                    enum: ['debug', 'info', 'warning', 'error', 'none'],
                },
                access: { type: 'string' },
                error: { type: 'string' },
            },
            required: ['loglevel', 'access', 'error'],
        },
        inbounds: {
            type: 'array',
            items: {
                type: 'object',
                properties: {
                    port: { type: 'integer', minimum: 1, maximum: 65535 },
                    listen: { type: 'string' },
                    protocol: { type: 'string' },
                },
                required: ['port', 'listen', 'protocol'],
            },
        },
        outbounds: {
            type: 'array',
            items: {
                type: 'object',
                properties: {
                    protocol: { type: 'string' },
                    tag: { type: 'string' },
                },
                required: ['protocol'],
            },
        },
        routing: {
            type: 'object',
            properties: {
                domainStrategy: {
                    type: 'string',
                    enum: ['AsIs', 'IPIfNonMatch', 'IPOnDemand'],
                },
                rules: {
                    type: 'array',
                    items: {
                        type: 'object',
                        properties: {
                            type: { type: 'string', const: 'field' },
                            ip: stringList,
                            domain: stringList,
                            network: {
                                type: 'string',
                                enum: ['tcp', 'udp', 'tcp,udp'],
                            },
                            outboundTag: { type: 'string' },
                        },
                        required: ['type', 'outboundTag'],
                        anyOf: [
                            { required: ['ip'] },
                            { required: ['domain'] },
                            { required: ['network'] },
                        ],
                    },
                },
            },
            required: ['domainStrategy', 'rules'],
        },
    },
    required: ['log', 'inbounds', 'outbounds'],
};

const validate = new Ajv({ allErrors: true }).compile<V2rayConfig>(schema);

export async function loadV2rayConfig(file: string): Promise<V2rayConfig> {
    const content = (await fs.readFile(file)).toString();
    let data: unknown;
    try {
        data = JSON.parse(content);
    } catch (e) {
        throw new MalformedPayloadError(file, e);
    }
    if (!validate(data)) {
        throw new ValidationError(
            (validate.errors || []).map(
                (err) => `${err.instancePath || '/'} ${err.message}`
            )
        );
    }
    return data;
}

export async function saveV2rayConfig(file: string, cfg: V2rayConfig) {
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, JSON.stringify(cfg, null, 2));
}

/**
 * Seeds a synthesizer from the saved document, or from the default template
 * when there is none or it cannot be read.
 */
export async function openConfig(file: string): Promise<ConfigSynthesizer> {
    if (existsSync(file)) {
        try {
            return new ConfigSynthesizer(await loadV2rayConfig(file));
        } catch (e) {
            logger.warn(`Could not load ${file}, using defaults. ${e}`);
        }
    }
    return new ConfigSynthesizer(defaultConfig());
}
