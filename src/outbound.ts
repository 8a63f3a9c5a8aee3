import type {
    DecodedLink,
    RealityProfile,
    SecurityProfile,
    StreamProfile,
    TlsProfile,
} from './profiles';

function transportSettings(stream: StreamProfile): StreamSettings {
    switch (stream.network) {
        case 'tcp': {
            if (!stream.disguise) {
                return {};
            }
            const { path, host } = stream.disguise;
            const request: { path?: string[]; headers?: { Host: string[] } } =
                {};
            if (path.length > 0) {
                request.path = path;
            }
            if (host.length > 0) {
                request.headers = { Host: host };
            }
            return {
                tcpSettings: {
                    header:
                        request.path || request.headers
                            ? { type: 'http', request }
                            : { type: 'http' },
                },
            };
        }
        case 'ws': {
            const wsSettings: WsSettings = {};
            if (stream.path) {
                wsSettings.path = stream.path;
            }
            if (stream.host) {
                wsSettings.headers = { Host: stream.host };
            }
            return Object.keys(wsSettings).length > 0 ? { wsSettings } : {};
        }
        case 'h2':
        case 'http': {
            const httpSettings: HttpSettings = {};
            if (stream.path) {
                httpSettings.path = stream.path;
            }
            if (stream.host) {
                httpSettings.host = stream.host;
            }
            return Object.keys(httpSettings).length > 0
                ? { httpSettings }
                : {};
        }
        case 'xhttp': {
            const xhttpSettings: XhttpSettings = {};
            if (stream.path) {
                xhttpSettings.path = stream.path;
            }
            if (stream.host) {
                xhttpSettings.host = stream.host;
            }
            return Object.keys(xhttpSettings).length > 0
                ? { xhttpSettings }
                : {};
        }
    }
}

function tlsSettings(profile: TlsProfile): TlsSettings {
    const settings: TlsSettings = { allowInsecure: profile.allowInsecure };
    if (profile.serverName) {
        settings.serverName = profile.serverName;
    }
    if (profile.alpn) {
        settings.alpn = [...profile.alpn];
    }
    if (profile.fingerprint) {
        settings.fingerprint = profile.fingerprint;
    }
    return settings;
}

function realitySettings(profile: RealityProfile): RealitySettings {
    const { mode, ...fields } = profile;
    return fields;
}

/**
 * Wire shape of a stream/security pair, or undefined when neither carries
 * anything.
 */
export function toStreamSettings(
    stream: StreamProfile | undefined,
    security: SecurityProfile
): StreamSettings | undefined {
    if (!stream && security.mode === 'none') {
        return;
    }
    let settings: StreamSettings = {};
    if (stream) {
        settings = { network: stream.network, ...transportSettings(stream) };
    }
    if (security.mode === 'tls') {
        settings.security = 'tls';
        settings.tlsSettings = tlsSettings(security);
    } else if (security.mode === 'reality') {
        settings.security = 'reality';
        const reality = realitySettings(security);
        if (Object.keys(reality).length > 0) {
            settings.realitySettings = reality;
        }
    }
    return settings;
}

/**
 * Composes a decoded link into a single-server, single-user outbound. The
 * result is untagged.
 */
export function assembleOutbound(link: DecodedLink): ProxyOutbound {
    const { descriptor } = link;
    const streamSettings = toStreamSettings(link.stream, link.security);
    let ob: ProxyOutbound;
    if (descriptor.protocol === 'vmess') {
        ob = {
            protocol: 'vmess',
            settings: {
                vnext: [
                    {
                        address: descriptor.address,
                        port: descriptor.port,
                        users: [
                            {
                                id: descriptor.id,
                                alterId: descriptor.alterId,
                                security: descriptor.security,
                            },
                        ],
                    },
                ],
            },
        };
    } else {
        const user: VLessUser = {
            id: descriptor.id,
            encryption: descriptor.encryption,
        };
        if (descriptor.flow) {
            user.flow = descriptor.flow;
        }
        ob = {
            protocol: 'vless',
            settings: {
                vnext: [
                    {
                        address: descriptor.address,
                        port: descriptor.port,
                        users: [user],
                    },
                ],
            },
        };
    }
    if (streamSettings) {
        ob.streamSettings = streamSettings;
    }
    return ob;
}
