type V2rayLogLevel = 'debug' | 'info' | 'warning' | 'error' | 'none';

interface Settings {
    'v2ray.config': string;
    'v2ray.log.level': V2rayLogLevel;
    'socks.port': number;
    'http.port': number;
    sniffing: boolean;
    'routing.rebuild': boolean;
    'routing.geoip': boolean;
    'direct.domains': string[];
    'log.level': string;
}

type VMessUser = {
    id: string;
    alterId: number;
    security: string;
};

type VLessUser = {
    id: string;
    encryption: string;
    flow?: string;
};

type VNext<U> = {
    address: string;
    port: number;
    users: U[];
};

type TcpSettings = {
    header:
        | { type: 'none' }
        | {
              type: 'http';
              request?: {
                  path?: string[];
                  headers?: { Host: string[] };
              };
          };
};

type WsSettings = {
    path?: string;
    headers?: { Host: string };
};

type HttpSettings = {
    path?: string;
    host?: string[];
};

type XhttpSettings = {
    path?: string;
    host?: string;
};

type TlsSettings = {
    serverName?: string;
    allowInsecure: boolean;
    alpn?: string[];
    fingerprint?: string;
};

type RealitySettings = {
    serverName?: string;
    fingerprint?: string;
    publicKey?: string;
    shortId?: string;
    spiderX?: string;
};

type StreamSettings = {
    network?: 'tcp' | 'ws' | 'h2' | 'http' | 'xhttp';
    security?: 'tls' | 'reality';
    tlsSettings?: TlsSettings;
    realitySettings?: RealitySettings;
    tcpSettings?: TcpSettings;
    wsSettings?: WsSettings;
    httpSettings?: HttpSettings;
    xhttpSettings?: XhttpSettings;
};

type VMessOutbound = {
    protocol: 'vmess';
    tag?: string;
    settings: { vnext: VNext<VMessUser>[] };
    streamSettings?: StreamSettings;
};

type VLessOutbound = {
    protocol: 'vless';
    tag?: string;
    settings: { vnext: VNext<VLessUser>[] };
    streamSettings?: StreamSettings;
};

type ProxyOutbound = VMessOutbound | VLessOutbound;

// Loaded documents may carry any outbound the engine understands.
type Outbound = {
    protocol: string;
    tag?: string;
    settings?: {
        vnext?: VNext<VMessUser | VLessUser>[];
        [key: string]: unknown;
    };
    streamSettings?: StreamSettings;
};

type Inbound = {
    port: number;
    listen: string;
    protocol: string;
    tag?: string;
    settings?: Record<string, unknown>;
    sniffing?: {
        enabled: boolean;
        destOverride?: string[];
    };
};

type Rule =
    | { type: 'field'; ip: string[]; outboundTag: string }
    | { type: 'field'; domain: string[]; outboundTag: string }
    | { type: 'field'; network: 'tcp' | 'udp' | 'tcp,udp'; outboundTag: string };

type DomainStrategy = 'AsIs' | 'IPIfNonMatch' | 'IPOnDemand';

interface V2rayConfig {
    log: {
        loglevel: V2rayLogLevel;
        access: string;
        error: string;
    };
    inbounds: Inbound[];
    outbounds: Outbound[];
    routing?: {
        domainStrategy: DomainStrategy;
        rules: Rule[];
    };
}
