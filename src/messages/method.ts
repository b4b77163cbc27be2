/**
 * Direct method request/response shapes.
 * @module messages/method
 */
import {unsupportedOperation} from '../core/errors';

export type DirectMethodRequest = {
    /** Correlates the device's reply with this invocation. */
    correlationId: string;
    name: string;
    data: Buffer;
};

/**
 * Outcome of {@link DeviceProxy.invokeMethod}.
 *
 * The gateway only forwards the request; the device's reply arrives on the
 * method receiving link and is not routed back here, so every response is
 * `pending` and carries no status or payload.
 */
export type DirectMethodResponse = {
    readonly correlationId: string;
    readonly pending: true;
    readonly status: null;
    readonly data: null;
    /** `false` when no method sending link was registered and the request was dropped. */
    readonly delivered: boolean;
};

export const createPendingMethodResponse = (correlationId: string, delivered: boolean): DirectMethodResponse => ({
    correlationId,
    pending: true,
    status: null,
    data: null,
    delivered,
});

/**
 * Reads the device's actual reply. Always rejects: retrieving method results
 * is not implemented by this gateway.
 */
export const getMethodResult = (response: DirectMethodResponse): {status: number; data: Buffer | null} => {
    throw unsupportedOperation('Reading direct method results', {correlationId: response.correlationId});
};
