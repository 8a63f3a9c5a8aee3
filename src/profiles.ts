import { FallbackFingerprint, Fingerprints } from './constants';
import type { Fingerprint } from './constants';
import { UnsupportedNetworkTypeError } from './errors';
import { splitList } from './fields';

export type VMessDescriptor = Readonly<{
    protocol: 'vmess';
    address: string;
    port: number;
    id: string;
    alterId: number;
    security: string;
}>;

export type VLessDescriptor = Readonly<{
    protocol: 'vless';
    address: string;
    port: number;
    id: string;
    encryption: string;
    flow?: string;
}>;

export type ProxyDescriptor = VMessDescriptor | VLessDescriptor;

export type TcpProfile = {
    network: 'tcp';
    // HTTP header disguise
    disguise?: { path: string[]; host: string[] };
};

export type WsProfile = { network: 'ws'; path?: string; host?: string };

export type HttpProfile = {
    network: 'h2' | 'http';
    path?: string;
    host?: string[];
};

export type XhttpProfile = { network: 'xhttp'; path?: string; host?: string };

export type StreamProfile = TcpProfile | WsProfile | HttpProfile | XhttpProfile;

export type TlsProfile = {
    mode: 'tls';
    serverName?: string;
    allowInsecure: boolean;
    alpn?: string[];
    fingerprint?: Fingerprint;
};

export type RealityProfile = {
    mode: 'reality';
    serverName?: string;
    fingerprint?: string;
    publicKey?: string;
    shortId?: string;
    spiderX?: string;
};

export type SecurityProfile = { mode: 'none' } | TlsProfile | RealityProfile;

export const NoSecurity: SecurityProfile = { mode: 'none' };

export interface DecodedLink {
    name: string;
    descriptor: ProxyDescriptor;
    stream?: StreamProfile;
    security: SecurityProfile;
}

export interface StreamParams {
    path?: string;
    host?: string;
    headerType?: string;
}

export function buildStreamProfile(
    network: string,
    params: StreamParams
): StreamProfile {
    switch (network) {
        case 'tcp': {
            if (params.headerType !== 'http') {
                return { network: 'tcp' };
            }
            return {
                network: 'tcp',
                disguise: {
                    path: splitList(params.path),
                    host: splitList(params.host),
                },
            };
        }
        case 'ws': {
            const profile: WsProfile = { network: 'ws' };
            if (params.path) {
                profile.path = params.path;
            }
            if (params.host) {
                profile.host = params.host;
            }
            return profile;
        }
        case 'h2':
        case 'http': {
            const profile: HttpProfile = {
                network: network === 'h2' ? 'h2' : 'http',
            };
            if (params.path) {
                profile.path = params.path;
            }
            const host = splitList(params.host);
            if (host.length > 0) {
                profile.host = host;
            }
            return profile;
        }
        case 'xhttp': {
            const profile: XhttpProfile = { network: 'xhttp' };
            if (params.path) {
                profile.path = params.path;
            }
            if (params.host) {
                profile.host = params.host;
            }
            return profile;
        }
        default:
            throw new UnsupportedNetworkTypeError(network);
    }
}

export function isFingerprint(value: string): value is Fingerprint {
    const known: readonly string[] = Fingerprints;
    return known.includes(value);
}

export function normalizeFingerprint(value: string): Fingerprint {
    return isFingerprint(value) ? value : FallbackFingerprint;
}

export interface SecurityParams {
    sni?: string;
    allowInsecure?: boolean;
    alpn?: string;
    fp?: string;
    pbk?: string;
    sid?: string;
    spx?: string;
}

/**
 * Unknown modes resolve to no security. TLS certificates are verified unless
 * the caller explicitly asks otherwise.
 */
export function buildSecurityProfile(
    mode: string | undefined,
    params: SecurityParams
): SecurityProfile {
    switch (mode) {
        case 'tls': {
            const profile: TlsProfile = {
                mode: 'tls',
                allowInsecure: params.allowInsecure ?? false,
            };
            if (params.sni) {
                profile.serverName = params.sni;
            }
            const alpn = splitList(params.alpn);
            if (alpn.length > 0) {
                profile.alpn = alpn;
            }
            if (params.fp) {
                profile.fingerprint = normalizeFingerprint(params.fp);
            }
            return profile;
        }
        case 'reality': {
            const profile: RealityProfile = { mode: 'reality' };
            if (params.sni) {
                profile.serverName = params.sni;
            }
            if (params.fp) {
                profile.fingerprint = params.fp;
            }
            if (params.pbk) {
                profile.publicKey = params.pbk;
            }
            if (params.sid) {
                profile.shortId = params.sid;
            }
            if (params.spx) {
                profile.spiderX = params.spx;
            }
            return profile;
        }
        default:
            return NoSecurity;
    }
}
