import { DefaultVLessPort, VLessAllowInsecure } from './constants';
import {
    MalformedPayloadError,
    MissingRequiredFieldError,
    UnsupportedSchemeError,
} from './errors';
import { param, toPort } from './fields';
import { buildSecurityProfile, buildStreamProfile } from './profiles';
import type { DecodedLink, VLessDescriptor } from './profiles';

const Prefix = 'vless://';

function decodeComponent(segment: string, value: string): string {
    try {
        return decodeURIComponent(value);
    } catch (e) {
        throw new MalformedPayloadError(segment, e);
    }
}

// The fragment is only a display label, so a bad escape keeps it raw.
function label(raw: string): string | undefined {
    if (!raw) {
        return;
    }
    try {
        return decodeURIComponent(raw);
    } catch {
        return raw;
    }
}

// exactly one leading slash
function wsPath(path: string): string {
    const trimmed = path.startsWith('/') ? path.slice(1) : path;
    return '/' + trimmed;
}

/**
 * Splits `<userinfo>@<host>[:<port>]`. IPv6 hosts keep their brackets off.
 */
function splitAuthority(authority: string): {
    userinfo: string;
    host: string;
    port?: string;
} {
    const at = authority.lastIndexOf('@');
    const userinfo = at >= 0 ? authority.slice(0, at) : '';
    const hostport = authority.slice(at + 1);
    if (hostport.startsWith('[')) {
        const close = hostport.indexOf(']');
        if (close < 0) {
            throw new MalformedPayloadError(
                'host',
                new Error(`unterminated IPv6 address "${hostport}"`)
            );
        }
        const rest = hostport.slice(close + 1);
        if (rest && !rest.startsWith(':')) {
            throw new MalformedPayloadError(
                'host',
                new Error(`unexpected "${rest}" after IPv6 address`)
            );
        }
        return {
            userinfo,
            host: hostport.slice(1, close),
            port: rest ? rest.slice(1) : undefined,
        };
    }
    const colon = hostport.lastIndexOf(':');
    if (colon < 0) {
        return { userinfo, host: hostport };
    }
    return {
        userinfo,
        host: hostport.slice(0, colon),
        port: hostport.slice(colon + 1),
    };
}

/**
 * Decodes `vless://<uuid>@<host>:<port>?<params>#<label>`.
 */
export function decodeVLessURL(url: string): DecodedLink {
    if (!url.startsWith(Prefix)) {
        throw new UnsupportedSchemeError(url);
    }
    let rest = url.slice(Prefix.length);
    let hash = '';
    const hashIdx = rest.indexOf('#');
    if (hashIdx >= 0) {
        hash = rest.slice(hashIdx + 1);
        rest = rest.slice(0, hashIdx);
    }
    let search = '';
    const queryIdx = rest.indexOf('?');
    if (queryIdx >= 0) {
        search = rest.slice(queryIdx + 1);
        rest = rest.slice(0, queryIdx);
    }
    const slashIdx = rest.indexOf('/');
    const authority = slashIdx >= 0 ? rest.slice(0, slashIdx) : rest;

    const { userinfo, host, port } = splitAuthority(authority);
    const id = decodeComponent('user-info', userinfo);
    if (!id) {
        throw new MissingRequiredFieldError('uuid');
    }
    if (!host) {
        throw new MissingRequiredFieldError('host');
    }
    const query = new URLSearchParams(search);

    const flow = param(query, 'flow');
    const descriptor: VLessDescriptor = Object.freeze({
        protocol: 'vless',
        address: host,
        port: port ? toPort(port) : DefaultVLessPort,
        id,
        encryption: param(query, 'encryption') ?? 'none',
        ...(flow ? { flow } : {}),
    });

    let network = param(query, 'type') ?? 'tcp';
    // the engine has no native xhttp transport
    if (network === 'xhttp') {
        network = 'http';
    }
    const path = param(query, 'path');
    const stream = buildStreamProfile(network, {
        path: network === 'ws' && path ? wsPath(path) : path,
        host: param(query, 'host'),
        headerType: param(query, 'headerType'),
    });

    const security = buildSecurityProfile(param(query, 'security') ?? 'none', {
        sni: param(query, 'sni'),
        allowInsecure:
            param(query, 'allowInsecure') === '1' ? true : VLessAllowInsecure,
        alpn: param(query, 'alpn'),
        fp: param(query, 'fp'),
        pbk: param(query, 'pbk'),
        sid: param(query, 'sid'),
        spx: param(query, 'spx'),
    });

    return { name: label(hash) ?? host, descriptor, stream, security };
}
