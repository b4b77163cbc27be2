/**
 * Message envelope forwarded onto links.
 * @module messages/message
 */

/** System property keys the gateway stamps. Bodies are never interpreted. */
export enum SystemProperty {
    To = 'to',
    CorrelationId = 'correlationId',
    InputName = 'inputName',
}

/** Application property carrying the direct method name. */
export const METHOD_NAME_PROPERTY = 'IoThub-methodname';

export type Message = {
    body: Buffer;
    /** Application properties. */
    properties: Record<string, string>;
    systemProperties: Partial<Record<SystemProperty, string>>;
};

export type MessageOptions = {
    properties?: Record<string, string>;
    systemProperties?: Partial<Record<SystemProperty, string>>;
};

export const createMessage = (body: Buffer | Uint8Array | string, options: MessageOptions = {}): Message => ({
    body: typeof body === 'string' ? Buffer.from(body, 'utf8') : Buffer.from(body),
    properties: {...options.properties},
    systemProperties: {...options.systemProperties},
});
