export class LinkError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'LinkError';
    }
}

export class UnsupportedSchemeError extends LinkError {
    scheme: string;

    constructor(url: string) {
        const idx = url.indexOf('://');
        const scheme = idx >= 0 ? url.slice(0, idx) : 'unknown';
        super(`Unsupported protocol: ${scheme}`);
        this.name = 'UnsupportedSchemeError';
        this.scheme = scheme;
    }
}

export class MalformedPayloadError extends LinkError {
    segment: string;

    constructor(segment: string, cause: unknown) {
        const reason = cause instanceof Error ? cause.message : String(cause);
        super(`Malformed ${segment}: ${reason}`, { cause });
        this.name = 'MalformedPayloadError';
        this.segment = segment;
    }
}

export class MissingRequiredFieldError extends LinkError {
    field: string;

    constructor(field: string) {
        super(`Missing required field: ${field}`);
        this.name = 'MissingRequiredFieldError';
        this.field = field;
    }
}

export class InvalidNumericFieldError extends LinkError {
    field: string;
    value: unknown;

    constructor(field: string, value: unknown) {
        super(`Invalid numeric field ${field}: ${String(value)}`);
        this.name = 'InvalidNumericFieldError';
        this.field = field;
        this.value = value;
    }
}

export class UnsupportedNetworkTypeError extends LinkError {
    network: string;

    constructor(network: string) {
        super(`Unsupported network type: ${network}`);
        this.name = 'UnsupportedNetworkTypeError';
        this.network = network;
    }
}

export class ValidationError extends LinkError {
    problems: string[];

    constructor(problems: string[]) {
        super(`Invalid configuration: ${problems.join('; ')}`);
        this.name = 'ValidationError';
        this.problems = problems;
    }
}
