import { getConfig } from './config';
import { parseProxyURL } from './formats';
import logger from './logger';
import { loadV2rayConfig, openConfig, saveV2rayConfig } from './store';
import { ConfigSynthesizer } from './v2ray';

/**
 * Makes the given link the proxy of the saved engine configuration and
 * applies the user's settings on top.
 */
export async function importLink(url: string): Promise<V2rayConfig> {
    const { name, host, ob } = parseProxyURL(url);
    logger.info(`Parsed ${ob.protocol} link [${name}] ${host}`);

    const file = getConfig('v2ray.config');
    const synth = await openConfig(file);
    synth.setOutbound(ob);
    if (getConfig('routing.rebuild')) {
        synth.rebuildProxyRouting({ geoip: getConfig('routing.geoip') });
    }
    synth.setDirectDomains(getConfig('direct.domains'));
    synth.setLogLevel(getConfig('v2ray.log.level'));
    synth.setInboundPort(getConfig('socks.port'), 'socks');
    synth.setInboundPort(getConfig('http.port'), 'http');
    synth.enableSniffing(getConfig('sniffing'));
    synth.assertValid();

    await saveV2rayConfig(file, synth.config);
    logger.info(`Configuration saved to ${file}`);
    synth.summary().forEach((line) => logger.info(line));
    return synth.toJSON();
}

export async function describeConfig(): Promise<string[]> {
    const synth = new ConfigSynthesizer(
        await loadV2rayConfig(getConfig('v2ray.config'))
    );
    return synth.summary();
}
