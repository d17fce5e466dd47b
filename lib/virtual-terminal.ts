/**
 * In-memory reader driver for exercising readers without hardware
 */

import { setTimeout as delay } from 'timers/promises';
import {
    CardCommunicationError,
    CardRemovedError,
    ReaderCommunicationError,
    SCARD_E_NO_SMARTCARD,
} from './errors';
import type { CardChannel, ReaderDriver, RemovalEventSource } from './types';

/**
 * Bytes given as a buffer, a byte array or a hex string ("00A40400")
 */
export type ByteSource = Buffer | number[] | string;

export function toBuffer(bytes: ByteSource): Buffer {
    if (typeof bytes === 'string') {
        return Buffer.from(bytes.replace(/\s+/g, ''), 'hex');
    }
    return Buffer.from(bytes);
}

export interface VirtualCardResponse {
    command: ByteSource;
    response: ByteSource;
}

export interface VirtualCardOptions {
    /** Latency of every exchange in ms */
    transmitDelay?: number;
}

/**
 * Card answering configured responses, `90 00` to anything else
 */
export class VirtualCard {
    readonly powerOnData: Buffer;
    readonly transmitDelay: number;
    /** Every command received, in order */
    readonly commands: Buffer[] = [];

    private readonly _responses = new Map<string, Buffer>();

    constructor(
        powerOnData: ByteSource,
        responses: VirtualCardResponse[] = [],
        options: VirtualCardOptions = {}
    ) {
        this.powerOnData = toBuffer(powerOnData);
        this.transmitDelay = options.transmitDelay ?? 0;
        for (const { command, response } of responses) {
            this.setResponse(command, response);
        }
    }

    get transmitCount(): number {
        return this.commands.length;
    }

    setResponse(command: ByteSource, response: ByteSource): void {
        this._responses.set(toBuffer(command).toString('hex'), toBuffer(response));
    }

    respond(command: Buffer): Buffer {
        this.commands.push(Buffer.from(command));
        const response = this._responses.get(command.toString('hex'));
        return response ? Buffer.from(response) : Buffer.from([0x90, 0x00]);
    }
}

class VirtualChannel implements CardChannel {
    readonly powerOnData: Buffer;
    private _connected = true;

    constructor(
        private readonly _card: VirtualCard,
        private readonly _terminal: VirtualTerminal
    ) {
        this.powerOnData = Buffer.from(_card.powerOnData);
    }

    get connected(): boolean {
        return this._connected;
    }

    async transmit(command: Buffer): Promise<Buffer> {
        this._terminal.assertReachable();
        if (!this._connected) {
            throw new CardRemovedError('Card is not connected');
        }
        if (this._card.transmitDelay > 0) {
            await delay(this._card.transmitDelay);
        }
        if (!this._connected) {
            throw new CardRemovedError('Card was removed during exchange');
        }
        return this._card.respond(command);
    }

    async close(): Promise<void> {
        this._terminal.assertReachable();
        this._connected = false;
    }

    drop(): void {
        this._connected = false;
    }
}

export interface VirtualTerminalOptions {
    contactless?: boolean;
    /** Push removal events to watchers, like interrupt-capable hardware */
    removalEvents?: boolean;
}

/**
 * Reader driver backed by a {@link VirtualCard} slot
 */
export class VirtualTerminal implements ReaderDriver {
    readonly name: string;
    readonly contactless: boolean | undefined;
    readonly removalEvents: RemovalEventSource | undefined;
    /** Protocols the reader was asked to enable */
    readonly enabledProtocols = new Set<string>();

    private _card: VirtualCard | null = null;
    private _channel: VirtualChannel | null = null;
    private _reachable = true;
    private _released = false;
    private readonly _watchers = new Set<() => void>();

    constructor(name: string, options: VirtualTerminalOptions = {}) {
        this.name = name;
        this.contactless = options.contactless;
        this.removalEvents = options.removalEvents
            ? { watch: (listener) => this._watch(listener) }
            : undefined;
    }

    get card(): VirtualCard | null {
        return this._card;
    }

    get watcherCount(): number {
        return this._watchers.size;
    }

    get released(): boolean {
        return this._released;
    }

    insertCard(card: VirtualCard): void {
        if (this._card) {
            throw new Error('A card is already inserted');
        }
        this._card = card;
    }

    /**
     * Withdraw the card, dropping any open channel
     *
     * @returns False if the slot was empty
     */
    removeCard(): boolean {
        if (!this._card) {
            return false;
        }
        this._card = null;
        this._channel?.drop();
        this._channel = null;
        if (this.removalEvents) {
            for (const watcher of [...this._watchers]) {
                watcher();
            }
        }
        return true;
    }

    /**
     * Simulate a host-to-reader link failure
     */
    setReachable(reachable: boolean): void {
        this._reachable = reachable;
    }

    assertReachable(): void {
        if (!this._reachable) {
            throw new ReaderCommunicationError(`Reader ${this.name} is unreachable`);
        }
    }

    async isCardPresent(): Promise<boolean> {
        this.assertReachable();
        return this._card !== null;
    }

    async openChannel(): Promise<CardChannel> {
        this.assertReachable();
        if (!this._card) {
            throw new CardCommunicationError(
                `No card in ${this.name}`,
                SCARD_E_NO_SMARTCARD
            );
        }
        this._channel?.drop();
        this._channel = new VirtualChannel(this._card, this);
        return this._channel;
    }

    setProtocolEnabled(readerProtocol: string, enabled: boolean): void {
        if (enabled) {
            this.enabledProtocols.add(readerProtocol);
        } else {
            this.enabledProtocols.delete(readerProtocol);
        }
    }

    async release(): Promise<void> {
        this._watchers.clear();
        this._released = true;
    }

    private _watch(listener: () => void): () => void {
        this._watchers.add(listener);
        return () => {
            this._watchers.delete(listener);
        };
    }
}
