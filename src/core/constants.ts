/**
 * Connection handler defaults.
 * @module core/constants
 */
import {LinkRole} from '../links/roles';

/** Upper bound for closing a superseded or uncorrelated link. */
export const DEFAULT_LINK_CLOSE_TIMEOUT_MS = 60000;

/** Largest delay `setTimeout` honours; longer delays fire after 1ms. */
export const MAX_LINK_CLOSE_TIMEOUT_MS = 2147483647;

/** Operation labels used in `linkNotFound` / `sending` diagnostics. */
export enum ProxyOperation {
    CloudToDeviceMessage = 'C2D message',
    ModuleMessage = 'message',
    MethodInvocation = 'method request',
    DesiredPropertyUpdate = 'desired properties update',
    TwinUpdate = 'twin update',
}

/** Link role each outbound proxy operation is delivered on. */
export const PROXY_OPERATION_ROLES: Readonly<Record<ProxyOperation, LinkRole>> = {
    [ProxyOperation.CloudToDeviceMessage]: LinkRole.CloudToDevice,
    [ProxyOperation.ModuleMessage]: LinkRole.ModuleMessages,
    [ProxyOperation.MethodInvocation]: LinkRole.MethodSending,
    [ProxyOperation.DesiredPropertyUpdate]: LinkRole.TwinSending,
    [ProxyOperation.TwinUpdate]: LinkRole.TwinSending,
};
