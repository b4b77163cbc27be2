/**
 * Role-keyed registry of the links open on one client connection.
 * @module core/LinkRegistry
 */
import {EventEmitter} from 'events';

import {closeLinkWithTimeout, type Link} from '../links/link';
import {getPairedRole, type LinkRole} from '../links/roles';
import {SerialQueue} from './SerialQueue';

/**
 * Typed event map emitted by {@link LinkRegistry}.
 */
export interface LinkRegistryEvents {
    /** Emitted after `link` was installed at its role. */
    registered: [link: Link];
    /** Emitted before `previous` is closed to make room for `next` on the same role. */
    superseded: [previous: Link, next: Link];
    /** Emitted before the paired `stale` link is closed because its correlation id differs from `next`. */
    uncorrelated: [stale: Link, next: Link];
    /** Emitted after `link` left the registry. */
    removed: [link: Link];
}

const assertLink = (link: Link | null | undefined): Link => {
    if (link === null || link === undefined) {
        throw new TypeError('link is required');
    }
    return link;
};

/**
 * At most one link per role; paired roles never stay registered with
 * mismatched correlation ids.
 *
 * Every mutation runs on one {@link SerialQueue}, so concurrent link-open
 * events cannot interleave. Reads are synchronous and never wait.
 */
export class LinkRegistry extends EventEmitter<LinkRegistryEvents> {
    private readonly entries = new Map<LinkRole, Link>();
    private readonly queue = new SerialQueue();

    public get size(): number {
        return this.entries.size;
    }

    public get(role: LinkRole): Link | undefined {
        return this.entries.get(role);
    }

    public has(role: LinkRole): boolean {
        return this.entries.has(role);
    }

    public roles(): LinkRole[] {
        return Array.from(this.entries.keys());
    }

    public links(): Link[] {
        return Array.from(this.entries.values());
    }

    /**
     * Installs `link` at its role.
     *
     * A link already holding the role is closed first, then a paired link whose
     * correlation id differs. The map is only touched once every close
     * succeeded; a close failure rejects and leaves the registry as it was.
     */
    public register(link: Link, closeTimeoutMs: number): Promise<void> {
        const next = assertLink(link);
        return this.queue.run(async () => {
            const current = this.entries.get(next.role);
            if (current && current !== next) {
                this.emit('superseded', current, next);
                await closeLinkWithTimeout(current, closeTimeoutMs);
            }

            const pairedRole = getPairedRole(next.role);
            const paired = pairedRole === null ? undefined : this.entries.get(pairedRole);
            if (pairedRole !== null && paired && paired.correlationId !== next.correlationId) {
                this.emit('uncorrelated', paired, next);
                await closeLinkWithTimeout(paired, closeTimeoutMs);
                this.entries.delete(pairedRole);
            }

            this.entries.set(next.role, next);
            this.emit('registered', next);
        });
    }

    /**
     * Removes `link` if it still holds its role.
     *
     * A link that was already superseded does not evict its replacement.
     * `onDrained` runs inside the same serialized section when this removal
     * empties the registry.
     *
     * @returns `true` when the registry became empty.
     */
    public remove(link: Link | null | undefined, onDrained?: () => Promise<void>): Promise<boolean> {
        const target = assertLink(link);
        return this.queue.run(async () => {
            if (this.entries.get(target.role) !== target) return false;

            this.entries.delete(target.role);
            this.emit('removed', target);
            if (this.entries.size > 0) return false;

            await onDrained?.();
            return true;
        });
    }
}
