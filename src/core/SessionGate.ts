/**
 * Lazy, single-flight creation of the device session.
 * @module core/SessionGate
 */
import type {Identity} from '../identity/identity';
import type {DeviceSession, SessionProvider} from '../session/types';
import {GatewayError, wrapGatewayError} from './errors';
import {OnceCell, SerialQueue} from './SerialQueue';

/**
 * Creates the session for one connection at most once.
 *
 * Creation and teardown share one serialization domain: `close()` waits for
 * an in-flight creation and never sees a session that is not bound yet.
 *
 * A provider failure leaves the gate empty and a later call retries. A `bind`
 * failure closes the fresh session and fails the gate for good, so the
 * provider is never asked twice.
 */
export class SessionGate {
    private readonly cell = new OnceCell<DeviceSession>();
    private readonly domain = new SerialQueue();
    private bound: DeviceSession | null = null;
    private closed = false;
    private failure: GatewayError | null = null;

    constructor(
        private readonly identity: Identity,
        private readonly provider: SessionProvider,
    ) {}

    /** `true` once a bound session was closed. */
    public get isClosed(): boolean {
        return this.closed;
    }

    /** Returns the bound session without creating one. */
    public current(): DeviceSession | undefined {
        return this.bound ?? undefined;
    }

    /**
     * Returns the session, creating it on first use.
     *
     * `bind` runs before the session is stored, so concurrent callers only ever
     * receive a fully bound instance.
     */
    public getSession(bind: (session: DeviceSession) => void): Promise<DeviceSession> {
        if (this.bound) return Promise.resolve(this.bound);
        if (this.failure) return Promise.reject(this.failure);
        return this.cell.get(() => this.domain.run(async () => {
            let session: DeviceSession;
            try {
                session = await this.provider.createSession(this.identity);
            } catch (err) {
                throw wrapGatewayError(err, 'session', 'SESSION_CREATE_FAILED', {identity: this.identity.id});
            }
            try {
                bind(session);
            } catch (err) {
                this.failure = await this.discard(session, err);
                throw this.failure;
            }
            this.bound = session;
            return session;
        }));
    }

    /**
     * Closes the bound session, if any. Later calls are no-ops.
     *
     * `onClosing` runs inside the session domain, after any in-flight creation.
     *
     * @returns `true` when this call closed the session.
     */
    public close(onClosing?: () => void): Promise<boolean> {
        return this.domain.run(async () => {
            onClosing?.();
            const session = this.bound;
            if (!session || this.closed) return false;

            this.closed = true;
            try {
                await session.close();
            } catch (err) {
                throw wrapGatewayError(err, 'session', 'SESSION_CLOSE_FAILED', {identity: this.identity.id});
            }
            return true;
        });
    }

    private async discard(session: DeviceSession, reason: unknown): Promise<GatewayError> {
        const details: Record<string, unknown> = {identity: this.identity.id};
        try {
            await session.close();
        } catch (closeErr) {
            details.closeError = closeErr;
        }
        return new GatewayError({
            message: reason instanceof Error ? reason.message : String(reason),
            domain: 'session',
            code: 'SESSION_BIND_FAILED',
            details,
            cause: reason,
        });
    }
}
