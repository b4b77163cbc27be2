import {
    ConnectionHandler,
    createMessage,
    createModuleIdentity,
    type DeviceProxy,
    type DeviceSession,
    type Link,
    LinkRole,
    type Message,
    SystemProperty,
} from '../src';

type CliOptions = {
    deviceId: string;
    moduleId: string;
};

function parseArgs(argv: string[]): CliOptions {
    const options: CliOptions = {deviceId: 'edge-device', moduleId: 'filter'};
    for (const arg of argv) {
        if (arg.startsWith('--device=')) {
            options.deviceId = arg.substring('--device='.length);
        } else if (arg.startsWith('--module=')) {
            options.moduleId = arg.substring('--module='.length);
        }
    }
    return options;
}

class ConsoleLink implements Link {
    constructor(
        public readonly role: LinkRole,
        public readonly correlationId: string | null = null,
    ) {}

    public async send(message: Message): Promise<void> {
        console.log(`[${this.role}] -> to=${message.systemProperties[SystemProperty.To] ?? '-'} body=${message.body.toString('utf8')}`);
    }

    public async close(timeoutMs: number): Promise<void> {
        console.log(`[${this.role}] closed (timeout ${timeoutMs}ms)`);
    }
}

class ConsoleSession implements DeviceSession {
    private proxy: DeviceProxy | null = null;

    public bindProxy(proxy: DeviceProxy): void {
        this.proxy = proxy;
    }

    public async deliver(text: string): Promise<void> {
        await this.proxy?.sendCloudToDeviceMessage(createMessage(text));
    }

    public async close(): Promise<void> {
        await this.proxy?.close();
    }
}

const options = parseArgs(process.argv.slice(2));
const identity = createModuleIdentity(options.deviceId, options.moduleId);
const session = new ConsoleSession();

const handler = new ConnectionHandler(
    identity,
    {createSession: async () => session},
    {close: async () => console.log('client connection closed')},
    {linkCloseTimeoutMs: 5000},
);

handler.on('linkRegistered', (link) => console.log(`registered ${link.role}`));
handler.on('linkSuperseded', (previous) => console.log(`superseding ${previous.role}`));
handler.on('linkUncorrelated', (stale, next) => {
    console.log(`closing ${stale.role} (${stale.correlationId}) uncorrelated with ${next.role} (${next.correlationId})`);
});
handler.on('linkNotFound', (role, id, operation) => console.log(`dropped ${operation} for ${id.id}: no ${role} link`));
handler.on('allLinksClosed', (id) => console.log(`all links closed for ${id.id}`));

async function main(): Promise<void> {
    const c2d = new ConsoleLink(LinkRole.CloudToDevice);
    const methodSending = new ConsoleLink(LinkRole.MethodSending, 'req-1');

    await handler.registerLink(c2d);
    await handler.registerLink(methodSending);
    await handler.registerLink(new ConsoleLink(LinkRole.MethodReceiving, 'req-2'));

    await handler.getSession();
    await session.deliver('hello module');

    for (const link of handler.getLinks()) {
        await handler.removeLink(link);
    }
}

main().catch((err) => {
    console.error(err);
    process.exitCode = 1;
});
