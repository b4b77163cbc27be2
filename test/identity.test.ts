import {describe, expect, it} from 'vitest';

import {buildDeviceAddress, createDeviceIdentity, createModuleIdentity, isModuleIdentity} from '../src';

describe('identity', () => {
    it('creates frozen device identities keyed by device id', () => {
        const identity = createDeviceIdentity('d1');

        expect(identity).toEqual({kind: 'device', id: 'd1', deviceId: 'd1'});
        expect(Object.isFrozen(identity)).toBe(true);
        expect(isModuleIdentity(identity)).toBe(false);
    });

    it('creates module identities with a composite id', () => {
        const identity = createModuleIdentity('d1', 'm1');

        expect(identity).toEqual({kind: 'module', id: 'd1/m1', deviceId: 'd1', moduleId: 'm1'});
        expect(isModuleIdentity(identity)).toBe(true);
    });

    it('rejects empty ids', () => {
        expect(() => createDeviceIdentity('')).toThrow(RangeError);
        expect(() => createModuleIdentity('d1', '')).toThrow(RangeError);
        expect(() => createModuleIdentity('', 'm1')).toThrow(RangeError);
    });
});

describe('buildDeviceAddress', () => {
    it('builds device and module addresses', () => {
        expect(buildDeviceAddress(createDeviceIdentity('d1'))).toBe('/devices/d1');
        expect(buildDeviceAddress(createModuleIdentity('d1', 'm1'))).toBe('/devices/d1/modules/m1');
    });

    it('percent-encodes each segment separately', () => {
        expect(buildDeviceAddress(createDeviceIdentity('dev 1/x'))).toBe('/devices/dev%201%2Fx');
        expect(buildDeviceAddress(createModuleIdentity('edge#1', 'mod?a=b'))).toBe(
            '/devices/edge%231/modules/mod%3Fa%3Db',
        );
    });
});
