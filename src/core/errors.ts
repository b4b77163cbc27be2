/**
 * Structured gateway error taxonomy.
 * @module core/errors
 */

export type GatewayErrorDomain = 'link' | 'session' | 'proxy' | 'timeout';

export type GatewayErrorCode =
    | 'LINK_CLOSE_TIMEOUT'
    | 'LINK_CLOSE_FAILED'
    | 'LINK_SEND_FAILED'
    | 'SESSION_CREATE_FAILED'
    | 'SESSION_BIND_FAILED'
    | 'SESSION_CLOSE_FAILED'
    | 'CONNECTION_CLOSE_FAILED'
    | 'UNSUPPORTED_OPERATION';

export class GatewayError extends Error {
    public readonly domain: GatewayErrorDomain;
    public readonly code: GatewayErrorCode;
    public readonly details?: Record<string, unknown>;

    constructor(params: {
        message: string;
        domain: GatewayErrorDomain;
        code: GatewayErrorCode;
        details?: Record<string, unknown>;
        cause?: unknown;
    }) {
        super(params.message, params.cause === undefined ? undefined : {cause: params.cause});
        this.name = 'GatewayError';
        this.domain = params.domain;
        this.code = params.code;
        this.details = params.details;
    }
}

/**
 * Wraps an arbitrary failure into a {@link GatewayError}, keeping the original as `cause`.
 * Existing gateway errors pass through unchanged.
 */
export const wrapGatewayError = (
    err: unknown,
    domain: GatewayErrorDomain,
    code: GatewayErrorCode,
    details?: Record<string, unknown>,
): GatewayError => {
    if (err instanceof GatewayError) return err;
    const message = err instanceof Error ? err.message : String(err);
    return new GatewayError({
        message,
        domain,
        code,
        details,
        cause: err,
    });
};

export const unsupportedOperation = (operation: string, details?: Record<string, unknown>): GatewayError =>
    new GatewayError({
        message: `${operation} is not supported by this gateway`,
        domain: 'proxy',
        code: 'UNSUPPORTED_OPERATION',
        details: {operation, ...details},
    });
