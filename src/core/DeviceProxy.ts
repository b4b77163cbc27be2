/**
 * Outbound delivery from a device session onto the connection's links.
 * @module core/DeviceProxy
 */
import {buildDeviceAddress, type Identity} from '../identity/identity';
import {isSendingLink, type SendingLink} from '../links/link';
import {type Message, METHOD_NAME_PROPERTY, SystemProperty, createMessage} from '../messages/message';
import {createPendingMethodResponse, type DirectMethodRequest, type DirectMethodResponse} from '../messages/method';
import type {DeviceProxy} from '../session/types';
import {PROXY_OPERATION_ROLES, ProxyOperation} from './constants';
import {unsupportedOperation, wrapGatewayError} from './errors';
import type {ConnectionHandler} from './ConnectionHandler';

/**
 * {@link DeviceProxy} bound to one {@link ConnectionHandler}.
 *
 * Every send looks up its link and forwards; when the link is not registered
 * the message is dropped and a `linkNotFound` diagnostic is emitted. Nothing
 * is queued or retried here.
 */
export class LinkDeviceProxy implements DeviceProxy {
    private active = true;

    constructor(
        private readonly handler: ConnectionHandler,
        public readonly identity: Identity,
    ) {}

    public get isActive(): boolean {
        return this.active;
    }

    public async sendCloudToDeviceMessage(message: Message): Promise<void> {
        const link = this.findLink(ProxyOperation.CloudToDeviceMessage);
        if (!link) return;

        message.systemProperties[SystemProperty.To] = buildDeviceAddress(this.identity);
        await this.deliver(link, ProxyOperation.CloudToDeviceMessage, message);
    }

    public async sendMessage(message: Message, inputName: string): Promise<void> {
        const link = this.findLink(ProxyOperation.ModuleMessage);
        if (!link) return;

        message.systemProperties[SystemProperty.InputName] = inputName;
        await this.deliver(link, ProxyOperation.ModuleMessage, message);
    }

    /**
     * Forwards a direct method call to the device.
     *
     * The returned response is always pending: the device's reply is not
     * routed back through the proxy. See {@link getMethodResult}.
     */
    public async invokeMethod(request: DirectMethodRequest): Promise<DirectMethodResponse> {
        const link = this.findLink(ProxyOperation.MethodInvocation);
        if (!link) return createPendingMethodResponse(request.correlationId, false);

        const message = createMessage(request.data, {
            properties: {[METHOD_NAME_PROPERTY]: request.name},
            systemProperties: {[SystemProperty.CorrelationId]: request.correlationId},
        });
        await this.deliver(link, ProxyOperation.MethodInvocation, message);
        return createPendingMethodResponse(request.correlationId, true);
    }

    public async onDesiredPropertyUpdates(message: Message): Promise<void> {
        const link = this.findLink(ProxyOperation.DesiredPropertyUpdate);
        if (!link) return;
        await this.deliver(link, ProxyOperation.DesiredPropertyUpdate, message);
    }

    public async sendTwinUpdate(message: Message): Promise<void> {
        const link = this.findLink(ProxyOperation.TwinUpdate);
        if (!link) return;
        await this.deliver(link, ProxyOperation.TwinUpdate, message);
    }

    /**
     * Closes the client connection once. Calls after the first, or after
     * {@link setInactive}, do nothing.
     */
    public async close(error?: Error): Promise<void> {
        if (!this.active) return;
        this.active = false;

        this.handler.emit('proxyClosing', this.identity, error);
        await this.handler.closeClientConnection();
    }

    /** Marks the proxy undeliverable without touching the transport. */
    public setInactive(): void {
        this.handler.emit('proxyInactive', this.identity);
        this.active = false;
    }

    public async getUpdatedIdentity(): Promise<Identity | null> {
        throw unsupportedOperation('getUpdatedIdentity', {identity: this.identity.id});
    }

    private findLink(operation: ProxyOperation): SendingLink | undefined {
        const role = PROXY_OPERATION_ROLES[operation];
        const link = this.handler.getLink(role);
        if (link && isSendingLink(link)) return link;

        this.handler.emit('linkNotFound', role, this.identity, operation);
        return undefined;
    }

    private async deliver(link: SendingLink, operation: ProxyOperation, message: Message): Promise<void> {
        this.handler.emit('sending', operation, this.identity);
        try {
            await link.send(message);
        } catch (err) {
            throw wrapGatewayError(err, 'link', 'LINK_SEND_FAILED', {
                role: link.role,
                operation,
                identity: this.identity.id,
            });
        }
    }
}
