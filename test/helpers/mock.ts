/**
 * Mock PC/SC implementation and reader fixtures for testing without hardware
 */

import { hasRemovalEvents } from '../../lib/capabilities';
import { AutonomousReader, PollingReader } from '../../lib/local-reader';
import { Logger } from '../../lib/logger';
import { PcscDriver } from '../../lib/pcsc-driver';
import {
    VirtualCard,
    VirtualTerminal,
    type VirtualCardResponse,
} from '../../lib/virtual-terminal';
import type {
    MonitorEvent,
    PcscCard,
    PcscContext,
    PcscReader,
    PcscReaderMonitor,
    ReaderOptions,
    TransmitOptions,
} from '../../lib/types';

export const silentLogger = new Logger('test', 'silent');

export function tick(ms = 0): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

// Protocol constants for testing
export const SCARD_PROTOCOL_T0 = 1;
export const SCARD_PROTOCOL_T1 = 2;
export const SCARD_STATE_PRESENT = 0x20;

// Power-on data used across tests
export const CONTACT_ATR = Buffer.from([
    0x3b, 0x16, 0x96, 0x41, 0x73, 0x74, 0x72, 0x69, 0x64,
]);
export const ISO_14443_4_ATR = Buffer.from([
    0x3b, 0x88, 0x80, 0x01, 0x00, 0x00, 0x00, 0x00, 0x33, 0x81, 0x81, 0x00,
    0x3a,
]);
export const MIFARE_CLASSIC_ATR = Buffer.from(
    '3B8F8001804F0CA000000306030001000000006A',
    'hex'
);

export interface MockCardResponse {
    command: Buffer | number[];
    response: Buffer | number[];
}

interface MockCardOptions {
    transmitDelay?: number;
}

export class MockCard implements PcscCard {
    private _protocol: number;
    private _atr: Buffer;
    private _responses: MockCardResponse[];
    private _connected = true;
    private _transmitDelay: number;
    private _transmitCount = 0;
    _lastTransmitOptions: TransmitOptions = {};
    _lastDisposition: number | undefined;

    constructor(
        protocol: number,
        atr: Buffer,
        responses: MockCardResponse[] = [],
        options: MockCardOptions = {}
    ) {
        this._protocol = protocol;
        this._atr = atr;
        this._responses = responses;
        this._transmitDelay = options.transmitDelay || 0;
    }

    get protocol(): number {
        return this._protocol;
    }

    get transmitCount(): number {
        return this._transmitCount;
    }

    get connected(): boolean {
        return this._connected;
    }

    get atr(): Buffer | null {
        return this._connected ? this._atr : null;
    }

    async transmit(
        command: Buffer | number[],
        options: TransmitOptions = {}
    ): Promise<Buffer> {
        if (!this._connected) {
            throw new Error('Card is not connected');
        }

        this._transmitCount++;

        // Store options for testing
        this._lastTransmitOptions = options;

        if (this._transmitDelay > 0) {
            await tick(this._transmitDelay);
        }

        const cmdBuffer = Buffer.isBuffer(command)
            ? command
            : Buffer.from(command);

        // Find matching response
        for (const { command: cmd, response } of this._responses) {
            const cmdMatch = Buffer.isBuffer(cmd) ? cmd : Buffer.from(cmd);
            if (cmdBuffer.equals(cmdMatch)) {
                return Buffer.isBuffer(response)
                    ? response
                    : Buffer.from(response);
            }
        }

        // Default: return success status (90 00)
        return Buffer.from([0x90, 0x00]);
    }

    disconnect(disposition?: number): void {
        this._lastDisposition = disposition;
        this._connected = false;
    }

    reconnect(): void {
        this._connected = true;
    }
}

export class MockReader implements PcscReader {
    readonly name: string;
    protected _card: MockCard | null;
    protected _state: number;
    protected _connectAttempts = 0;
    readonly connectProtocols: (number | undefined)[] = [];

    constructor(name: string, card: MockCard | null = null) {
        this.name = name;
        this._card = card;
        this._state = card ? 0x122 : 0x12; // PRESENT or EMPTY
    }

    get state(): number {
        return this._state;
    }

    get atr(): Buffer | null {
        return this._card ? this._card.atr : null;
    }

    get connectAttempts(): number {
        return this._connectAttempts;
    }

    async connect(_shareMode?: number, protocol?: number): Promise<MockCard> {
        this._connectAttempts++;
        this.connectProtocols.push(protocol);
        if (!this._card) {
            throw new Error('No card in reader');
        }
        this._card.reconnect();
        return this._card;
    }

    insertCard(card: MockCard): void {
        this._card = card;
        this._state = 0x122;
    }

    removeCard(): void {
        if (this._card) {
            this._card.disconnect();
        }
        this._card = null;
        this._state = 0x12;
    }
}

export class MockContext implements PcscContext {
    private _readers: MockReader[] = [];
    private _valid = true;
    private _failure: Error | null = null;

    get isValid(): boolean {
        return this._valid;
    }

    listReaders(): MockReader[] {
        if (this._failure) {
            throw this._failure;
        }
        return [...this._readers];
    }

    close(): void {
        this._valid = false;
    }

    addReader(reader: MockReader): void {
        this._readers.push(reader);
    }

    removeReader(name: string): void {
        this._readers = this._readers.filter((r) => r.name !== name);
    }

    /**
     * Make listReaders throw, as a stopped PC/SC service does
     */
    failWith(error: Error | null): void {
        this._failure = error;
    }
}

export class MockReaderMonitor implements PcscReaderMonitor {
    private _running = false;
    private _callback: ((event: MonitorEvent) => void) | null = null;
    private _readers: MockReader[] = [];
    startCount = 0;

    get isRunning(): boolean {
        return this._running;
    }

    start(callback: (event: MonitorEvent) => void): void {
        if (this._running) {
            throw new Error('Monitor is already running');
        }
        this._callback = callback;
        this._running = true;
        this.startCount++;

        // Emit events for existing readers
        for (const reader of this._readers) {
            this._emitEvent(
                'reader-attached',
                reader.name,
                reader.state,
                reader.atr
            );
        }
    }

    stop(): void {
        this._running = false;
        this._callback = null;
    }

    emitRaw(event: MonitorEvent): void {
        this._callback?.(event);
    }

    private _emitEvent(
        type: MonitorEvent['type'],
        readerName: string,
        state: number,
        atr: Buffer | null
    ): void {
        if (this._callback) {
            this._callback({ type, reader: readerName, state, atr });
        }
    }

    attachReader(reader: MockReader): void {
        this._readers.push(reader);
        if (this._running) {
            this._emitEvent(
                'reader-attached',
                reader.name,
                reader.state,
                reader.atr
            );
        }
    }

    detachReader(name: string): void {
        this._readers = this._readers.filter((r) => r.name !== name);
        if (this._running) {
            this._emitEvent('reader-detached', name, 0, null);
        }
    }

    insertCard(readerName: string, card: MockCard): void {
        const reader = this._readers.find((r) => r.name === readerName);
        if (reader) {
            reader.insertCard(card);
            if (this._running) {
                this._emitEvent(
                    'card-inserted',
                    readerName,
                    reader.state,
                    card.atr
                );
            }
        }
    }

    removeCard(readerName: string): void {
        const reader = this._readers.find((r) => r.name === readerName);
        if (reader) {
            reader.removeCard();
            if (this._running) {
                this._emitEvent('card-removed', readerName, reader.state, null);
            }
        }
    }
}

/**
 * A mock reader that fails with "unresponsive" error on dual protocol (T0|T1)
 * but succeeds when connecting with T0 only
 */
export class UnresponsiveDualProtocolReader extends MockReader {
    async connect(_shareMode?: number, protocol?: number): Promise<MockCard> {
        this._connectAttempts++;
        this.connectProtocols.push(protocol);
        if (!this._card) {
            throw new Error('No card in reader');
        }
        if (protocol === (SCARD_PROTOCOL_T0 | SCARD_PROTOCOL_T1)) {
            throw new Error('Card is unresponsive');
        }
        return this._card;
    }
}

/**
 * A mock reader that always fails to connect
 */
export class FailingMockReader extends MockReader {
    private _error: Error;

    constructor(
        name: string,
        card: MockCard | null = null,
        error: Error = new Error('Connection failed')
    ) {
        super(name, card);
        this._error = error;
    }

    async connect(_shareMode?: number, protocol?: number): Promise<MockCard> {
        this._connectAttempts++;
        this.connectProtocols.push(protocol);
        throw this._error;
    }
}

/**
 * A mock card that fails transmit after a certain number of commands
 * Simulates card removal during operation
 */
export class UnstableMockCard extends MockCard {
    private _failAfter: number;

    constructor(
        protocol: number,
        atr: Buffer,
        responses: MockCardResponse[] = [],
        failAfter = 3
    ) {
        super(protocol, atr, responses);
        this._failAfter = failAfter;
    }

    async transmit(
        command: Buffer | number[],
        options: TransmitOptions = {}
    ): Promise<Buffer> {
        if (!this.connected) {
            throw new Error('Card is not connected');
        }
        if (this.transmitCount >= this._failAfter) {
            this.disconnect();
            throw new Error('Card was removed');
        }
        return super.transmit(command, options);
    }
}

export interface PcscTestSetup {
    driver: PcscDriver;
    context: MockContext;
    monitor: MockReaderMonitor;
    reader: MockReader;
    card: MockCard;
}

export interface PcscTestSetupOptions {
    readerName?: string;
    cardProtocol?: number;
    cardAtr?: Buffer;
    cardResponses?: MockCardResponse[];
    withMonitor?: boolean;
    ReaderClass?: new (name: string, card: MockCard | null) => MockReader;
}

/**
 * Create a PC/SC driver over a mock context, reader, card and monitor
 */
export function createPcscSetup(options: PcscTestSetupOptions = {}): PcscTestSetup {
    const {
        readerName = 'Test Reader',
        cardProtocol = SCARD_PROTOCOL_T0,
        cardAtr = CONTACT_ATR,
        cardResponses = [],
        withMonitor = false,
        ReaderClass = MockReader,
    } = options;

    const card = new MockCard(cardProtocol, cardAtr, cardResponses);
    const reader = new ReaderClass(readerName, card);
    const context = new MockContext();
    const monitor = new MockReaderMonitor();

    context.addReader(reader);
    monitor.attachReader(reader);

    const driver = new PcscDriver({
        context,
        readerName,
        monitor: withMonitor ? monitor : undefined,
        logger: silentLogger,
    });

    return { driver, context, monitor, reader, card };
}

export interface VirtualSetupOptions {
    name?: string;
    powerOnData?: Buffer;
    responses?: VirtualCardResponse[];
    transmitDelay?: number;
    insert?: boolean;
    readerOptions?: ReaderOptions;
}

export interface PollingSetup {
    terminal: VirtualTerminal;
    card: VirtualCard;
    reader: PollingReader;
}

export interface AutonomousSetup {
    terminal: VirtualTerminal;
    card: VirtualCard;
    reader: AutonomousReader;
}

function createCard(options: VirtualSetupOptions): VirtualCard {
    return new VirtualCard(options.powerOnData ?? CONTACT_ATR, options.responses, {
        transmitDelay: options.transmitDelay,
    });
}

/**
 * Polling reader over a virtual terminal, card inserted unless `insert` is false
 */
export function createPollingSetup(options: VirtualSetupOptions = {}): PollingSetup {
    const terminal = new VirtualTerminal(options.name ?? 'Virtual Reader');
    const card = createCard(options);
    if (options.insert ?? true) {
        terminal.insertCard(card);
    }
    const reader = new PollingReader(terminal, {
        logger: silentLogger,
        ...options.readerOptions,
    });
    return { terminal, card, reader };
}

/**
 * Autonomous reader over a virtual terminal pushing removal events
 */
export function createAutonomousSetup(
    options: VirtualSetupOptions = {}
): AutonomousSetup {
    const terminal = new VirtualTerminal(options.name ?? 'Virtual Reader', {
        removalEvents: true,
    });
    const card = createCard(options);
    if (options.insert ?? true) {
        terminal.insertCard(card);
    }
    if (!hasRemovalEvents(terminal)) {
        throw new Error('Terminal does not push removal events');
    }
    const reader = new AutonomousReader(terminal, {
        logger: silentLogger,
        ...options.readerOptions,
    });
    return { terminal, card, reader };
}
