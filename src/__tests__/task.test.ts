import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { loadConfig, setConfig } from '../config';
import { UnsupportedSchemeError } from '../errors';
import { describeConfig, importLink } from '../task';

let dir: string;
let file: string;

const link =
    'vless://11111111-1111-1111-1111-111111111111@example.com:443?security=tls&sni=example.com&type=ws&path=ray#node';

beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'raylink-task-'));
    file = path.join(dir, 'v2ray', 'config.json');
    await loadConfig(path.join(dir, 'raylink.json'));
    await setConfig('v2ray.config', file);
});

afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
});

describe('importLink', () => {
    it('writes a validated configuration with the proxy first', async () => {
        await setConfig('direct.domains', ['example.org']);
        await setConfig('socks.port', 2080);
        const cfg = await importLink(link);

        expect(cfg.outbounds.map((ob) => ob.tag)).toEqual([
            'proxy',
            'direct',
            'block',
        ]);
        expect(cfg.outbounds[0].streamSettings).toEqual({
            network: 'ws',
            wsSettings: { path: '/ray' },
            security: 'tls',
            tlsSettings: { serverName: 'example.com', allowInsecure: false },
        });
        expect(cfg.inbounds[0].port).toBe(2080);
        expect(cfg.log.loglevel).toBe('warning');

        const rules = cfg.routing?.rules ?? [];
        expect(rules).toHaveLength(6);
        expect(rules[4]).toEqual({
            type: 'field',
            domain: ['example.org'],
            outboundTag: 'direct',
        });
        expect(rules[5]).toEqual({
            type: 'field',
            network: 'tcp,udp',
            outboundTag: 'proxy',
        });

        const saved = JSON.parse(await fs.readFile(file, 'utf8'));
        expect(saved).toEqual(cfg);
    });

    it('replaces the proxy on a second import', async () => {
        await importLink(link);
        await importLink(
            'vless://22222222-2222-2222-2222-222222222222@other.example.com:8443'
        );
        expect(await describeConfig()).toEqual([
            'Inbounds: 2',
            'Outbounds: 3',
            'Proxy: vless -> other.example.com:8443',
        ]);
    });

    it('keeps custom rules when routing rebuild is off', async () => {
        await setConfig('routing.rebuild', false);
        const cfg = await importLink(link);
        expect(cfg.routing?.rules).toHaveLength(3);
    });

    it('saves nothing for an unsupported link', async () => {
        await expect(importLink('ftp://example.com')).rejects.toBeInstanceOf(
            UnsupportedSchemeError
        );
        await expect(fs.stat(file)).rejects.toThrow();
    });
});
