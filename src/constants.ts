import os from 'os';
import path from 'path';

export const DataDir =
    process.env.RAYLINK_HOME || path.join(os.homedir(), '.raylink');

export const LogDir = path.join(DataDir, 'logs');

export const ProxyTag = 'proxy';
export const DirectTag = 'direct';
export const BlockTag = 'block';

export const Fingerprints = [
    'chrome',
    'firefox',
    'safari',
    'edge',
    '360',
    'qq',
    'android',
    'ios',
    'random',
    'randomized',
] as const;

export type Fingerprint = (typeof Fingerprints)[number];

// Substituted for unknown TLS fingerprints. Reality passes them through.
export const FallbackFingerprint: Fingerprint = 'chrome';

// Legacy vmess links are permissive about certificates, vless links are not.
export const VMessAllowInsecure = true;
export const VLessAllowInsecure = false;

export const DefaultVLessPort = 443;

// Rules setDirectDomains must never remove.
export const BuiltinGeoRules = [
    'geoip:private',
    'geoip:cn',
    'geosite:cn',
    'geosite:category-games@cn',
];
