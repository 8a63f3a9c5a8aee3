import { UnsupportedSchemeError } from './errors';
import { assembleOutbound } from './outbound';
import type { DecodedLink } from './profiles';
import { decodeVLessURL } from './vless';
import { decodeVMessURL } from './vmess';

type Decoder = (url: string) => DecodedLink;

const decoders: { prefix: string; decoder: Decoder }[] = [
    { prefix: 'vmess://', decoder: decodeVMessURL },
    { prefix: 'vless://', decoder: decodeVLessURL },
];

export function decodeURL(url: string): DecodedLink {
    for (let i = 0; i < decoders.length; i++) {
        const { prefix, decoder } = decoders[i];
        if (url.startsWith(prefix)) {
            return decoder(url);
        }
    }
    throw new UnsupportedSchemeError(url);
}

export function parseProxyURL(url: string): {
    name: string;
    host: string;
    ob: ProxyOutbound;
} {
    const link = decodeURL(url.trim());
    return {
        name: link.name,
        host: link.descriptor.address,
        ob: assembleOutbound(link),
    };
}
