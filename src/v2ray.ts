import logger from './logger';
import { BlockTag, BuiltinGeoRules, DirectTag, ProxyTag } from './constants';
import { MissingRequiredFieldError, ValidationError } from './errors';
import { toPort } from './fields';

export function defaultConfig(): V2rayConfig {
    return {
        log: {
            loglevel: 'debug',
            access: 'access.log',
            error: 'error.log',
        },
        inbounds: [
            {
                port: 1080,
                listen: '127.0.0.1',
                protocol: 'socks',
                settings: {
                    auth: 'noauth',
                    udp: true,
                    ip: '127.0.0.1',
                },
                sniffing: {
                    enabled: true,
                    destOverride: ['http', 'tls'],
                },
            },
            {
                port: 1081,
                listen: '127.0.0.1',
                protocol: 'http',
                settings: {
                    timeout: 300,
                },
            },
        ],
        outbounds: [
            { protocol: 'freedom', tag: DirectTag, settings: {} },
            { protocol: 'blackhole', tag: BlockTag, settings: {} },
        ],
        routing: {
            domainStrategy: 'IPIfNonMatch',
            rules: [
                { type: 'field', ip: ['geoip:private'], outboundTag: DirectTag },
                { type: 'field', ip: ['geoip:cn'], outboundTag: DirectTag },
                {
                    type: 'field',
                    domain: ['geosite:category-ads-all'],
                    outboundTag: BlockTag,
                },
            ],
        },
    };
}

/**
 * Routing used while a proxy outbound is active. The catch-all rule is always
 * last.
 */
export function proxyRoutingRules(geoip = true): Rule[] {
    const rules: Rule[] = [
        { type: 'field', ip: ['geoip:private'], outboundTag: DirectTag },
    ];
    if (geoip) {
        rules.push({ type: 'field', ip: ['geoip:cn'], outboundTag: DirectTag });
    }
    rules.push(
        {
            type: 'field',
            domain: ['geosite:category-ads-all'],
            outboundTag: BlockTag,
        },
        {
            type: 'field',
            domain: ['geosite:cn', 'geosite:category-games@cn'],
            outboundTag: DirectTag,
        },
        { type: 'field', network: 'tcp,udp', outboundTag: ProxyTag }
    );
    return rules;
}

function isCatchAll(rule: Rule): boolean {
    return 'network' in rule && rule.outboundTag === ProxyTag;
}

function isCustomDirectDomain(rule: Rule): boolean {
    return (
        'domain' in rule &&
        rule.outboundTag === DirectTag &&
        rule.domain.length === 1 &&
        !BuiltinGeoRules.includes(rule.domain[0])
    );
}

const LogLevels = new Map<string, V2rayLogLevel>([
    ['debug', 'debug'],
    ['info', 'info'],
    ['warn', 'warning'],
    ['warning', 'warning'],
    ['error', 'error'],
    ['none', 'none'],
]);

/**
 * Owns one engine configuration document and keeps exactly one outbound
 * tagged `proxy` in front of the others.
 *
 * Not safe for concurrent mutation; callers serialize access.
 */
export class ConfigSynthesizer {
    private cfg: V2rayConfig;
    private logger = logger.child({ module: 'config' });

    constructor(cfg: V2rayConfig = defaultConfig()) {
        this.cfg = cfg;
    }

    get config(): V2rayConfig {
        return this.cfg;
    }

    toJSON(): V2rayConfig {
        return structuredClone(this.cfg);
    }

    /**
     * Replaces the proxy outbound. Other outbounds keep their order behind
     * it. Routing is left alone; see rebuildProxyRouting.
     */
    setOutbound(outbound: Outbound) {
        const proxy: Outbound = { ...structuredClone(outbound), tag: ProxyTag };
        this.cfg.outbounds = [
            proxy,
            ...this.cfg.outbounds.filter((ob) => ob.tag !== ProxyTag),
        ];
        this.logger.debug(`Set ${proxy.protocol} outbound as ${ProxyTag}`);
    }

    rebuildProxyRouting({ geoip = true }: { geoip?: boolean } = {}) {
        this.cfg.routing = {
            domainStrategy: 'IPIfNonMatch',
            rules: proxyRoutingRules(geoip),
        };
    }

    private routing(): NonNullable<V2rayConfig['routing']> {
        if (!this.cfg.routing) {
            this.cfg.routing = { domainStrategy: 'IPIfNonMatch', rules: [] };
        }
        return this.cfg.routing;
    }

    addRoutingRule(rule: Rule) {
        const { rules } = this.routing();
        const copy = structuredClone(rule);
        const last = rules[rules.length - 1];
        if (last && isCatchAll(last)) {
            rules.splice(rules.length - 1, 0, copy);
        } else {
            rules.push(copy);
        }
    }

    addDirectDomain(domain: string) {
        if (!domain) {
            throw new MissingRequiredFieldError('domain');
        }
        this.addRoutingRule({
            type: 'field',
            domain: [domain],
            outboundTag: DirectTag,
        });
    }

    addBlockedDomain(domain: string) {
        if (!domain) {
            throw new MissingRequiredFieldError('domain');
        }
        this.addRoutingRule({
            type: 'field',
            domain: [domain],
            outboundTag: BlockTag,
        });
    }

    /**
     * Replaces every single-domain direct rule outside the built-in geo set.
     */
    setDirectDomains(domains: string[]) {
        if (domains.some((domain) => !domain)) {
            throw new MissingRequiredFieldError('domain');
        }
        const routing = this.routing();
        routing.rules = routing.rules.filter(
            (rule) => !isCustomDirectDomain(rule)
        );
        domains.forEach((domain) => this.addDirectDomain(domain));
    }

    setLogLevel(level: string) {
        this.cfg.log = {
            ...this.cfg.log,
            loglevel: LogLevels.get(level.toLowerCase()) ?? 'info',
        };
    }

    setInboundPort(port: number, protocol = 'socks') {
        const value = toPort(port);
        const inbound = this.cfg.inbounds.find(
            (item) => item.protocol === protocol
        );
        if (!inbound) {
            this.logger.debug(`No ${protocol} inbound`);
            return;
        }
        inbound.port = value;
    }

    enableSniffing(enabled = true) {
        const inbound = this.cfg.inbounds.find(
            (item) => item.protocol === 'socks'
        );
        if (inbound) {
            inbound.sniffing = { ...inbound.sniffing, enabled };
        }
    }

    problems(): string[] {
        const problems: string[] = [];
        if (!Array.isArray(this.cfg.inbounds)) {
            problems.push('inbounds are missing');
        }
        if (!Array.isArray(this.cfg.outbounds)) {
            problems.push('outbounds are missing');
        } else {
            const n = this.cfg.outbounds.filter(
                (ob) => ob.tag === ProxyTag
            ).length;
            if (n !== 1) {
                problems.push(
                    `expected exactly one "${ProxyTag}" outbound, found ${n}`
                );
            }
        }
        return problems;
    }

    validate(): boolean {
        return this.problems().length === 0;
    }

    assertValid() {
        const problems = this.problems();
        if (problems.length > 0) {
            throw new ValidationError(problems);
        }
    }

    summary(): string[] {
        const lines = [
            `Inbounds: ${this.cfg.inbounds.length}`,
            `Outbounds: ${this.cfg.outbounds.length}`,
        ];
        const proxy = this.cfg.outbounds.find((ob) => ob.tag === ProxyTag);
        if (proxy) {
            const server = proxy.settings?.vnext?.[0];
            lines.push(
                `Proxy: ${proxy.protocol} -> ${server?.address ?? 'unknown'}:${
                    server?.port ?? 'unknown'
                }`
            );
        }
        return lines;
    }
}
