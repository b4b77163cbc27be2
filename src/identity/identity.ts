/**
 * Device and module identities addressed by one client connection.
 * @module identity/identity
 */

export type DeviceIdentity = {
    readonly kind: 'device';
    /** Map key for the connection; equal to `deviceId`. */
    readonly id: string;
    readonly deviceId: string;
};

export type ModuleIdentity = {
    readonly kind: 'module';
    /** `{deviceId}/{moduleId}` */
    readonly id: string;
    /** Parent device the module runs on. */
    readonly deviceId: string;
    readonly moduleId: string;
};

export type Identity = DeviceIdentity | ModuleIdentity;

const assertId = (value: unknown, name: string): string => {
    if (typeof value !== 'string' || value.length === 0) {
        throw new RangeError(`${name} must be a non-empty string, got ${JSON.stringify(value)}`);
    }
    return value;
};

export const createDeviceIdentity = (deviceId: string): DeviceIdentity => {
    const id = assertId(deviceId, 'deviceId');
    return Object.freeze({kind: 'device', id, deviceId: id});
};

export const createModuleIdentity = (deviceId: string, moduleId: string): ModuleIdentity => {
    const device = assertId(deviceId, 'deviceId');
    const mod = assertId(moduleId, 'moduleId');
    return Object.freeze({kind: 'module', id: `${device}/${mod}`, deviceId: device, moduleId: mod});
};

export const isModuleIdentity = (identity: Identity): identity is ModuleIdentity => identity.kind === 'module';

/**
 * Routing address stamped on cloud-to-device messages.
 * Each segment is percent-encoded separately.
 */
export const buildDeviceAddress = (identity: Identity): string => {
    const device = encodeURIComponent(identity.deviceId);
    if (isModuleIdentity(identity)) {
        return `/devices/${device}/modules/${encodeURIComponent(identity.moduleId)}`;
    }
    return `/devices/${device}`;
};
