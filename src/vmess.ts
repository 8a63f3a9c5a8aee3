import { VMessAllowInsecure } from './constants';
import {
    MalformedPayloadError,
    MissingRequiredFieldError,
    UnsupportedSchemeError,
} from './errors';
import { field, isRecord, param, toInteger, toPort } from './fields';
import {
    NoSecurity,
    buildSecurityProfile,
    buildStreamProfile,
} from './profiles';
import type { DecodedLink, VMessDescriptor } from './profiles';

const Prefix = 'vmess://';

const Base64Pattern = /^[A-Za-z0-9+/_-]*={0,2}$/;

function decodePayload(payload: string): Record<string, unknown> {
    let b64 = payload;
    if (b64.includes('%')) {
        try {
            b64 = decodeURIComponent(b64);
        } catch (e) {
            throw new MalformedPayloadError('percent-encoding', e);
        }
    }
    // wrapped payloads carry line breaks
    b64 = b64.replace(/\s+/g, '');
    // legacy producers often drop the padding
    const missing = b64.length % 4;
    if (missing) {
        b64 += '='.repeat(4 - missing);
    }
    if (!Base64Pattern.test(b64)) {
        throw new MalformedPayloadError(
            'base64',
            new Error(`unexpected characters in "${b64}"`)
        );
    }
    let data: unknown;
    try {
        data = JSON.parse(Buffer.from(b64, 'base64').toString());
    } catch (e) {
        throw new MalformedPayloadError('json', e);
    }
    if (!isRecord(data)) {
        throw new MalformedPayloadError(
            'json',
            new Error('payload is not an object')
        );
    }
    return data;
}

/**
 * Decodes a legacy `vmess://<base64(JSON)>` link.
 */
export function decodeVMessLink(url: string): DecodedLink {
    if (!url.startsWith(Prefix)) {
        throw new UnsupportedSchemeError(url);
    }
    const data = decodePayload(url.slice(Prefix.length));

    const address = field(data, 'add') ?? field(data, 'host');
    if (!address) {
        throw new MissingRequiredFieldError('add');
    }
    const rawPort = field(data, 'port');
    if (!rawPort) {
        throw new MissingRequiredFieldError('port');
    }
    const id = field(data, 'id');
    if (!id) {
        throw new MissingRequiredFieldError('id');
    }
    const aid = field(data, 'aid');

    const descriptor: VMessDescriptor = Object.freeze({
        protocol: 'vmess',
        address,
        port: toPort(rawPort),
        id,
        alterId: aid ? toInteger('aid', aid) : 0,
        security: field(data, 'scy') ?? 'auto',
    });

    const net = field(data, 'net');
    const host = field(data, 'host');
    const stream = net
        ? buildStreamProfile(net, {
              path: field(data, 'path'),
              host,
              headerType: field(data, 'type'),
          })
        : undefined;

    const security =
        field(data, 'tls') === 'tls'
            ? buildSecurityProfile('tls', {
                  sni: field(data, 'sni') ?? host ?? address,
                  allowInsecure: VMessAllowInsecure,
                  alpn: field(data, 'alpn'),
                  fp: field(data, 'fp'),
              })
            : NoSecurity;

    return {
        name: field(data, 'ps') ?? address,
        descriptor,
        stream,
        security,
    };
}

/**
 * Decodes `vmess://<base64>?security=..&sni=..`: the embedded JSON first,
 * then the query overrides on top.
 */
export function decodeVMessURL(url: string): DecodedLink {
    if (!url.startsWith(Prefix)) {
        throw new UnsupportedSchemeError(url);
    }
    const rest = url.slice(Prefix.length);
    const idx = rest.indexOf('?');
    if (idx < 0) {
        return decodeVMessLink(url);
    }
    const link = decodeVMessLink(Prefix + rest.slice(0, idx));
    const query = new URLSearchParams(rest.slice(idx + 1));
    const mode = param(query, 'security');
    const sni = param(query, 'sni');

    let security = link.security;
    if (mode && mode !== security.mode) {
        security = buildSecurityProfile(mode, {
            sni: sni ?? link.descriptor.address,
            allowInsecure: VMessAllowInsecure,
        });
    }
    if (sni && security.mode !== 'none') {
        security = { ...security, serverName: sni };
    }
    return { ...link, security };
}
