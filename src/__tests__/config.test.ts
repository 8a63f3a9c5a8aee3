import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { getConfig, loadConfig, setConfig } from '../config';
import { ValidationError } from '../errors';

let dir: string;

beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'raylink-config-'));
});

afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
});

describe('settings', () => {
    it('writes the defaults when there is no file', async () => {
        const file = path.join(dir, 'raylink.json');
        await loadConfig(file);

        expect(getConfig('socks.port')).toBe(1080);
        expect(getConfig('http.port')).toBe(1081);
        expect(getConfig('v2ray.log.level')).toBe('warning');
        expect(getConfig('routing.rebuild')).toBe(true);
        expect(getConfig('direct.domains')).toEqual([]);

        const saved = JSON.parse(await fs.readFile(file, 'utf8'));
        expect(saved['socks.port']).toBe(1080);
    });

    it('coerces values, fills defaults and drops unknown keys', async () => {
        const file = path.join(dir, 'raylink.json');
        await fs.writeFile(
            file,
            JSON.stringify({ 'socks.port': '2080', sniffing: 'false', extra: 1 })
        );
        await loadConfig(file);

        expect(getConfig('socks.port')).toBe(2080);
        expect(getConfig('sniffing')).toBe(false);
        expect(getConfig('http.port')).toBe(1081);
    });

    it('rejects invalid settings', async () => {
        const file = path.join(dir, 'raylink.json');
        await fs.writeFile(file, JSON.stringify({ 'socks.port': 70000 }));
        await expect(loadConfig(file)).rejects.toBeInstanceOf(ValidationError);
    });

    it('persists updates', async () => {
        const file = path.join(dir, 'raylink.json');
        await loadConfig(file);
        await setConfig('direct.domains', ['example.org']);

        const saved = JSON.parse(await fs.readFile(file, 'utf8'));
        expect(saved['direct.domains']).toEqual(['example.org']);
    });
});
