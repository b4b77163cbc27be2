/**
 * Collaborators the connection handler talks to.
 * @module session/types
 */
import type {Identity} from '../identity/identity';
import type {Message} from '../messages/message';
import type {DirectMethodRequest, DirectMethodResponse} from '../messages/method';

/**
 * Outbound capabilities a session uses to reach its device or module.
 */
export interface DeviceProxy {
    readonly identity: Identity;
    /** `false` once the proxy was closed or marked inactive. */
    readonly isActive: boolean;
    sendCloudToDeviceMessage(message: Message): Promise<void>;
    sendMessage(message: Message, inputName: string): Promise<void>;
    invokeMethod(request: DirectMethodRequest): Promise<DirectMethodResponse>;
    onDesiredPropertyUpdates(message: Message): Promise<void>;
    sendTwinUpdate(message: Message): Promise<void>;
    close(error?: Error): Promise<void>;
    setInactive(): void;
    /** Declared for credential refresh; not supported by this gateway. */
    getUpdatedIdentity(): Promise<Identity | null>;
}

/** Logical device/module session, independent of transport. */
export interface DeviceSession {
    /** Called exactly once, before the session is handed to anyone. */
    bindProxy(proxy: DeviceProxy): void;
    close(): Promise<void>;
}

export interface SessionProvider {
    createSession(identity: Identity): Promise<DeviceSession>;
}

/** The physical client connection the links are multiplexed over. */
export interface ClientConnection {
    close(): Promise<void>;
}
