import { describe, expect, it } from 'vitest';

import { UnsupportedSchemeError } from '../errors';
import { decodeURL, parseProxyURL } from '../formats';

describe('parseProxyURL', () => {
    it('rejects unknown schemes by name', () => {
        expect(() => parseProxyURL('ftp://x')).toThrowError(
            UnsupportedSchemeError
        );
        expect(() => parseProxyURL('ftp://x')).toThrowError(
            'Unsupported protocol: ftp'
        );
        try {
            decodeURL('no scheme here');
            expect.unreachable();
        } catch (e) {
            expect(e).toMatchObject({ scheme: 'unknown' });
        }
    });

    it('keeps address, port and id of a vmess link', () => {
        const data = {
            add: '203.0.113.7',
            port: '10086',
            id: 'b831381d-6324-4d53-ad4f-8cda48b30811',
            ps: 'home',
        };
        const url =
            'vmess://' + Buffer.from(JSON.stringify(data)).toString('base64');
        const { name, host, ob } = parseProxyURL(url);
        expect(name).toBe('home');
        expect(host).toBe('203.0.113.7');
        expect(ob.protocol).toBe('vmess');
        const [server] = ob.settings.vnext;
        expect({
            add: server.address,
            port: String(server.port),
            id: server.users[0].id,
        }).toEqual({ add: data.add, port: data.port, id: data.id });
    });

    it('turns xhttp into http', () => {
        const { ob } = parseProxyURL('vless://u@h:443?type=xhttp');
        expect(ob.streamSettings?.network).toBe('http');
    });

    it('trims surrounding whitespace', () => {
        const { host } = parseProxyURL('  vless://u@h:443  \n');
        expect(host).toBe('h');
    });
});
