import {describe, expect, it, vi} from 'vitest';

import {
    ConnectionHandler,
    createDeviceIdentity,
    createMessage,
    createModuleIdentity,
    type DeviceSession,
    GatewayError,
    type Identity,
    type Link,
    LinkDeviceProxy,
    LinkRole,
    type Message,
    METHOD_NAME_PROPERTY,
    ProxyOperation,
    SystemProperty,
} from '../src';

class MockLink implements Link {
    public readonly close = vi.fn(async (_timeoutMs: number): Promise<void> => undefined);

    constructor(
        public readonly role: LinkRole,
        public readonly correlationId: string | null = null,
    ) {}
}

class MockSendingLink extends MockLink {
    public readonly send = vi.fn(async (_message: Message): Promise<void> => undefined);
}

const createHarness = (identity: Identity = createDeviceIdentity('d1')) => {
    const connection = {close: vi.fn(async () => undefined)};
    const session: DeviceSession = {bindProxy: vi.fn(), close: vi.fn(async () => undefined)};
    const provider = {createSession: vi.fn(async (_identity: Identity) => session)};
    const handler = new ConnectionHandler(identity, provider, connection);
    const proxy = new LinkDeviceProxy(handler, identity);
    return {connection, handler, proxy};
};

describe('LinkDeviceProxy', () => {
    it('stamps the module address on cloud-to-device messages', async () => {
        const {handler, proxy} = createHarness(createModuleIdentity('d1', 'm1'));
        const link = new MockSendingLink(LinkRole.CloudToDevice);
        await handler.registerLink(link);

        const message = createMessage('hello');
        await proxy.sendCloudToDeviceMessage(message);

        expect(link.send).toHaveBeenCalledWith(message);
        expect(message.systemProperties[SystemProperty.To]).toBe('/devices/d1/modules/m1');
    });

    it('stamps the device address and encodes it', async () => {
        const {handler, proxy} = createHarness(createDeviceIdentity('d 1'));
        const link = new MockSendingLink(LinkRole.CloudToDevice);
        await handler.registerLink(link);

        const message = createMessage('hello');
        await proxy.sendCloudToDeviceMessage(message);

        expect(message.systemProperties[SystemProperty.To]).toBe('/devices/d%201');
    });

    it('stamps the input name on module messages', async () => {
        const {handler, proxy} = createHarness(createModuleIdentity('d1', 'm1'));
        const link = new MockSendingLink(LinkRole.ModuleMessages);
        await handler.registerLink(link);
        const sending = vi.fn();
        handler.on('sending', sending);

        const message = createMessage(Buffer.from([1, 2, 3]));
        await proxy.sendMessage(message, 'input1');

        expect(link.send).toHaveBeenCalledWith(message);
        expect(message.systemProperties[SystemProperty.InputName]).toBe('input1');
        expect(sending).toHaveBeenCalledWith(ProxyOperation.ModuleMessage, proxy.identity);
    });

    it('forwards method invocations and returns a pending response', async () => {
        const {handler, proxy} = createHarness();
        const link = new MockSendingLink(LinkRole.MethodSending, 'rid');
        await handler.registerLink(link);

        const response = await proxy.invokeMethod({correlationId: 'c-42', name: 'reboot', data: Buffer.from('{}')});

        expect(response).toEqual({correlationId: 'c-42', pending: true, status: null, data: null, delivered: true});
        expect(link.send).toHaveBeenCalledTimes(1);
        const sent = link.send.mock.calls[0]?.[0];
        expect(sent?.body.toString('utf8')).toBe('{}');
        expect(sent?.properties).toEqual({[METHOD_NAME_PROPERTY]: 'reboot'});
        expect(sent?.systemProperties).toEqual({[SystemProperty.CorrelationId]: 'c-42'});
    });

    it('sends desired property and twin updates on the twin sending link', async () => {
        const {handler, proxy} = createHarness();
        const link = new MockSendingLink(LinkRole.TwinSending, 'twin');
        await handler.registerLink(link);

        const desired = createMessage('{"desired":{}}');
        const twin = createMessage('{"reported":{}}');
        await proxy.onDesiredPropertyUpdates(desired);
        await proxy.sendTwinUpdate(twin);

        expect(link.send.mock.calls.map(([message]) => message)).toEqual([desired, twin]);
        expect(desired.systemProperties).toEqual({});
    });

    it('drops messages without error when the link is missing', async () => {
        const {handler, proxy} = createHarness();
        const receiving = new MockLink(LinkRole.TwinReceiving, 'twin');
        await handler.registerLink(receiving);
        const notFound = vi.fn();
        handler.on('linkNotFound', notFound);

        const message = createMessage('x');
        await expect(proxy.sendCloudToDeviceMessage(message)).resolves.toBeUndefined();
        await expect(proxy.sendMessage(createMessage('x'), 'in')).resolves.toBeUndefined();
        await expect(proxy.onDesiredPropertyUpdates(createMessage('x'))).resolves.toBeUndefined();
        await expect(proxy.sendTwinUpdate(createMessage('x'))).resolves.toBeUndefined();
        await expect(proxy.invokeMethod({correlationId: 'c-1', name: 'm', data: Buffer.alloc(0)})).resolves.toEqual({
            correlationId: 'c-1',
            pending: true,
            status: null,
            data: null,
            delivered: false,
        });

        expect(message.systemProperties).toEqual({});
        expect(handler.getLinks()).toEqual([receiving]);
        expect(notFound.mock.calls).toEqual([
            [LinkRole.CloudToDevice, proxy.identity, ProxyOperation.CloudToDeviceMessage],
            [LinkRole.ModuleMessages, proxy.identity, ProxyOperation.ModuleMessage],
            [LinkRole.TwinSending, proxy.identity, ProxyOperation.DesiredPropertyUpdate],
            [LinkRole.TwinSending, proxy.identity, ProxyOperation.TwinUpdate],
            [LinkRole.MethodSending, proxy.identity, ProxyOperation.MethodInvocation],
        ]);
    });

    it('wraps link send failures', async () => {
        const {handler, proxy} = createHarness();
        const link = new MockSendingLink(LinkRole.CloudToDevice);
        link.send.mockRejectedValue(new Error('link detached'));
        await handler.registerLink(link);

        await expect(proxy.sendCloudToDeviceMessage(createMessage('x'))).rejects.toMatchObject({
            domain: 'link',
            code: 'LINK_SEND_FAILED',
            message: 'link detached',
            details: {role: LinkRole.CloudToDevice, operation: ProxyOperation.CloudToDeviceMessage, identity: 'd1'},
        });
    });

    it('closes the client connection exactly once under concurrent callers', async () => {
        const {connection, handler, proxy} = createHarness();
        const closing = vi.fn();
        handler.on('proxyClosing', closing);
        const reason = new Error('no handler registered');

        await Promise.all([
            proxy.close(reason),
            proxy.close(),
            proxy.close(),
            proxy.close(),
            proxy.close(),
        ]);

        expect(connection.close).toHaveBeenCalledTimes(1);
        expect(closing).toHaveBeenCalledTimes(1);
        expect(closing).toHaveBeenCalledWith(proxy.identity, reason);
        expect(proxy.isActive).toBe(false);
    });

    it('surfaces connection close failures to the first closer', async () => {
        const {connection, proxy} = createHarness();
        connection.close.mockRejectedValue(new Error('already reset'));

        await expect(proxy.close()).rejects.toMatchObject({code: 'CONNECTION_CLOSE_FAILED', message: 'already reset'});
        await expect(proxy.close()).resolves.toBeUndefined();
        expect(connection.close).toHaveBeenCalledTimes(1);
    });

    it('marks itself inactive without closing the connection', async () => {
        const {connection, handler, proxy} = createHarness();
        const inactive = vi.fn();
        handler.on('proxyInactive', inactive);

        expect(proxy.isActive).toBe(true);
        proxy.setInactive();

        expect(proxy.isActive).toBe(false);
        expect(inactive).toHaveBeenCalledWith(proxy.identity);
        expect(connection.close).not.toHaveBeenCalled();

        await proxy.close();
        expect(connection.close).not.toHaveBeenCalled();
    });

    it('reports identity refresh as unsupported', async () => {
        const {proxy} = createHarness();

        const err = await proxy.getUpdatedIdentity().catch((e: unknown) => e);

        expect(err).toBeInstanceOf(GatewayError);
        expect(err).toMatchObject({code: 'UNSUPPORTED_OPERATION', details: {operation: 'getUpdatedIdentity', identity: 'd1'}});
    });
});
