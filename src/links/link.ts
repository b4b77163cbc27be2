/**
 * Link contracts and close helpers.
 * @module links/link
 */
import {GatewayError, wrapGatewayError} from '../core/errors';
import type {Message} from '../messages/message';
import {isSendingRole, LinkRole} from './roles';

/**
 * One open protocol link, owned by the link registry while registered.
 */
export interface Link {
    /** Role the link was opened for. Never changes. */
    readonly role: LinkRole;
    /**
     * Opaque token assigned when the link opened. Paired roles must agree on it;
     * `null` means the peer supplied none.
     */
    readonly correlationId: string | null;
    /** Detaches the link. Must not wait on the registry that owns it. */
    close(timeoutMs: number): Promise<void>;
}

/** A link that can carry gateway-to-device traffic. */
export interface SendingLink extends Link {
    send(message: Message): Promise<void>;
}

/** Narrows by role tag and checks the link actually exposes `send`. */
export const isSendingLink = (link: Link): link is SendingLink =>
    isSendingRole(link.role) && 'send' in link && typeof link.send === 'function';

/**
 * Closes `link`, rejecting with `LINK_CLOSE_TIMEOUT` when it does not settle in `timeoutMs`.
 */
export const closeLinkWithTimeout = async (link: Link, timeoutMs: number): Promise<void> => {
    let timeoutId: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
        timeoutId = setTimeout(() => {
            reject(new GatewayError({
                message: `Closing ${link.role} link timed out after ${timeoutMs}ms`,
                domain: 'timeout',
                code: 'LINK_CLOSE_TIMEOUT',
                details: {role: link.role, correlationId: link.correlationId, timeoutMs},
            }));
        }, timeoutMs);
    });

    try {
        await Promise.race([link.close(timeoutMs), timeout]);
    } catch (err) {
        throw wrapGatewayError(err, 'link', 'LINK_CLOSE_FAILED', {
            role: link.role,
            correlationId: link.correlationId,
        });
    } finally {
        clearTimeout(timeoutId);
    }
};
