/**
 * Link roles multiplexed over one client connection.
 * @module links/roles
 */

/** Purpose of one protocol link. A connection holds at most one link per role. */
export enum LinkRole {
    CloudToDevice = 'cloud_to_device',
    DeviceToCloud = 'device_to_cloud',
    ModuleMessages = 'module_messages',
    MethodSending = 'method_sending',
    MethodReceiving = 'method_receiving',
    TwinSending = 'twin_sending',
    TwinReceiving = 'twin_receiving',
    Events = 'events',
}

const PAIRED_ROLES: ReadonlyMap<LinkRole, LinkRole> = new Map([
    [LinkRole.MethodSending, LinkRole.MethodReceiving],
    [LinkRole.MethodReceiving, LinkRole.MethodSending],
    [LinkRole.TwinSending, LinkRole.TwinReceiving],
    [LinkRole.TwinReceiving, LinkRole.TwinSending],
]);

const SENDING_ROLES: ReadonlySet<LinkRole> = new Set([
    LinkRole.CloudToDevice,
    LinkRole.ModuleMessages,
    LinkRole.MethodSending,
    LinkRole.TwinSending,
]);

/** Role that must share a correlation id with `role`, or `null` for unpaired roles. */
export const getPairedRole = (role: LinkRole): LinkRole | null => PAIRED_ROLES.get(role) ?? null;

/** Roles whose links deliver gateway-to-device traffic. */
export const isSendingRole = (role: LinkRole): boolean => SENDING_ROLES.has(role);

export const ALL_LINK_ROLES: readonly LinkRole[] = Object.values(LinkRole);
