/**
 * Per-connection link management and session binding.
 * @module core/ConnectionHandler
 */
import {EventEmitter} from 'events';

import type {Identity} from '../identity/identity';
import type {Link} from '../links/link';
import type {LinkRole} from '../links/roles';
import type {ClientConnection, DeviceProxy, DeviceSession, SessionProvider} from '../session/types';
import {DEFAULT_LINK_CLOSE_TIMEOUT_MS, MAX_LINK_CLOSE_TIMEOUT_MS, type ProxyOperation} from './constants';
import {LinkDeviceProxy} from './DeviceProxy';
import {wrapGatewayError} from './errors';
import {LinkRegistry} from './LinkRegistry';
import {SessionGate} from './SessionGate';

/**
 * Configuration for a {@link ConnectionHandler}.
 */
export type ConnectionHandlerOptions = {
    /** Bound for closing a superseded or uncorrelated link. Defaults to {@link DEFAULT_LINK_CLOSE_TIMEOUT_MS}. */
    linkCloseTimeoutMs?: number;
    /** Builds the proxy bound into the session. Defaults to {@link LinkDeviceProxy}. */
    proxyFactory?: (handler: ConnectionHandler, identity: Identity) => DeviceProxy;
};

/**
 * Typed event map emitted by {@link ConnectionHandler}.
 */
export interface ConnectionHandlerEvents {
    /** Emitted once the session was created and its proxy bound. */
    sessionCreated: [identity: Identity];
    linkRegistered: [link: Link];
    /** Emitted before a link holding the same role is closed. */
    linkSuperseded: [previous: Link, next: Link];
    /** Emitted before a paired link with a different correlation id is closed. */
    linkUncorrelated: [stale: Link, next: Link];
    linkRemoved: [link: Link];
    /** Emitted when an outbound message was dropped because its link is not registered. */
    linkNotFound: [role: LinkRole, identity: Identity, operation: ProxyOperation];
    /** Emitted right before a message is handed to a link. */
    sending: [operation: ProxyOperation, identity: Identity];
    /** Emitted when removing a link emptied the registry. */
    allLinksClosed: [identity: Identity];
    /** Emitted from the session domain, once any in-flight creation settled. */
    closingConnection: [identity: Identity];
    /** Emitted when the proxy closes the client connection. */
    proxyClosing: [identity: Identity, error?: Error];
    proxyInactive: [identity: Identity];
}

/**
 * Entry point for every link-open/link-close event and outbound send on one
 * client connection.
 *
 * Two independent serialization domains are used: the registry's (link
 * mutation) and the session gate's (session creation and teardown). Only the
 * teardown triggered by the last link closing touches both, always registry
 * first.
 */
export class ConnectionHandler extends EventEmitter<ConnectionHandlerEvents> {
    public readonly identity: Identity;
    private readonly connection: ClientConnection;
    private readonly registry = new LinkRegistry();
    private readonly gate: SessionGate;
    private readonly linkCloseTimeoutMs: number;
    private readonly proxyFactory: NonNullable<ConnectionHandlerOptions['proxyFactory']>;
    private boundProxy: DeviceProxy | null = null;

    constructor(
        identity: Identity,
        sessionProvider: SessionProvider,
        connection: ClientConnection,
        options: ConnectionHandlerOptions = {},
    ) {
        super();
        if (!identity) throw new TypeError('identity is required');
        if (!sessionProvider) throw new TypeError('sessionProvider is required');
        if (!connection) throw new TypeError('connection is required');

        this.linkCloseTimeoutMs = options.linkCloseTimeoutMs ?? DEFAULT_LINK_CLOSE_TIMEOUT_MS;
        if (!Number.isInteger(this.linkCloseTimeoutMs) || this.linkCloseTimeoutMs <= 0) {
            throw new RangeError(`linkCloseTimeoutMs must be a positive integer, got ${this.linkCloseTimeoutMs}`);
        }
        if (this.linkCloseTimeoutMs > MAX_LINK_CLOSE_TIMEOUT_MS) {
            throw new RangeError(
                `linkCloseTimeoutMs must not exceed ${MAX_LINK_CLOSE_TIMEOUT_MS}, got ${this.linkCloseTimeoutMs}`,
            );
        }

        this.identity = identity;
        this.connection = connection;
        this.gate = new SessionGate(identity, sessionProvider);
        this.proxyFactory = options.proxyFactory ?? ((handler, id) => new LinkDeviceProxy(handler, id));

        this.registry.on('registered', (link) => this.emit('linkRegistered', link));
        this.registry.on('superseded', (previous, next) => this.emit('linkSuperseded', previous, next));
        this.registry.on('uncorrelated', (stale, next) => this.emit('linkUncorrelated', stale, next));
        this.registry.on('removed', (link) => this.emit('linkRemoved', link));
    }

    /** Proxy bound into the session, once the session exists. */
    public get proxy(): DeviceProxy | undefined {
        return this.boundProxy ?? undefined;
    }

    public get linkCount(): number {
        return this.registry.size;
    }

    /** `true` once the session was closed by teardown. */
    public get isClosed(): boolean {
        return this.gate.isClosed;
    }

    public getLink(role: LinkRole): Link | undefined {
        return this.registry.get(role);
    }

    public getLinks(): Link[] {
        return this.registry.links();
    }

    /**
     * Returns the session for this connection, creating it and binding a fresh
     * proxy on first use. Concurrent first calls share one creation.
     */
    public getSession(): Promise<DeviceSession> {
        return this.gate.getSession((session) => {
            const proxy = this.proxyFactory(this, this.identity);
            session.bindProxy(proxy);
            this.boundProxy = proxy;
            this.emit('sessionCreated', this.identity);
        });
    }

    /**
     * Installs `link`, closing whatever it supersedes and any paired link with
     * a different correlation id. Close failures reject and abort the update.
     */
    public registerLink(link: Link): Promise<void> {
        return this.registry.register(link, this.linkCloseTimeoutMs);
    }

    /**
     * Removes `link`. Removing the last link closes the session.
     * Throws `TypeError` synchronously when `link` is missing.
     */
    public removeLink(link: Link | null | undefined): Promise<void> {
        return this.registry.remove(link, () => this.closeConnection()).then(() => undefined);
    }

    /**
     * Closes the underlying client connection.
     * Used by the bound proxy; the handler itself never closes the transport.
     */
    public async closeClientConnection(): Promise<void> {
        try {
            await this.connection.close();
        } catch (err) {
            throw wrapGatewayError(err, 'proxy', 'CONNECTION_CLOSE_FAILED', {identity: this.identity.id});
        }
    }

    private async closeConnection(): Promise<void> {
        this.emit('allLinksClosed', this.identity);
        await this.gate.close(() => this.emit('closingConnection', this.identity));
    }
}
