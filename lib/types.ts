/**
 * Type definitions for readers, their removal-detection capabilities and
 * the hardware drivers behind them
 */

import type { ChainingStrategy } from './apdu-chaining';
import type { Logger } from './logger';
import type { ProtocolRule } from './protocols';

/**
 * Reader able to communicate with smart cards.
 *
 * Blocking operations return promises; they settle when the hardware answers
 * or a driver-level timeout elapses.
 */
export interface ReaderSpi {
    /**
     * Gets the name of the reader. Never empty.
     */
    getName(): string;

    /**
     * Indicates if the reader protocol is supported by the reader.
     * Callers check this before invoking {@link activateProtocol}.
     */
    isProtocolSupported(readerProtocol: string): boolean;

    /**
     * Makes the reader able to communicate with cards using this protocol
     */
    activateProtocol(readerProtocol: string): void;

    /**
     * Makes the reader ignore cards using this protocol
     */
    deactivateProtocol(readerProtocol: string): void;

    /**
     * Tells if the current card communicates with the provided protocol.
     * Always false when no card is present.
     */
    isCurrentProtocol(readerProtocol: string): boolean;

    /**
     * Establishes the communication with the inserted card.
     *
     * @throws ReaderCommunicationError if the reader cannot be reached
     * @throws CardCommunicationError if the card does not respond
     */
    openPhysicalChannel(): Promise<void>;

    /**
     * Closes the current physical channel. The channel may already have been
     * closed by a card withdrawal, in which case this is a no-op.
     *
     * @throws ReaderCommunicationError if the reader faulted while closing
     */
    closePhysicalChannel(): Promise<void>;

    isPhysicalChannelOpen(): boolean;

    /**
     * Verifies the presence of a card. Absence is a `false` result, not an error.
     *
     * @throws ReaderCommunicationError if the reader cannot be reached
     */
    checkCardPresence(): Promise<boolean>;

    /**
     * Data retrieved by the reader when the card was powered on: the ATR for a
     * contact reader, a reader-defined equivalent for a contactless one.
     */
    getPowerOnData(): Buffer;

    /**
     * Transmits an APDU and returns the complete response (at least 2 bytes).
     * `61xy` responses are followed up transparently.
     *
     * @throws ReaderCommunicationError if the reader faulted
     * @throws CardCommunicationError if the card stopped responding
     */
    transmitApdu(apduIn: Buffer | number[]): Promise<Buffer>;

    isContactless(): boolean;

    /**
     * Releases hardware resources and removal listeners when the reader is
     * withdrawn from service
     */
    unregister(): Promise<void>;
}

/**
 * Reader able to detect a card removal during processing, between two APDU
 * commands, through {@link ReaderSpi.checkCardPresence}. PC/SC readers
 * typically work this way.
 */
export interface WaitForCardRemovalDuringProcessingSpi {
    readonly detectsCardRemovalDuringProcessing: true;
}

/**
 * Callback through which an autonomous reader reports a removal
 */
export interface WaitForCardRemovalAutonomousReaderApi {
    /**
     * Must be invoked once when a card is removed
     */
    onCardRemoved(): void;
}

/**
 * Reader whose hardware reports card removals on its own
 */
export interface WaitForCardRemovalAutonomousSpi {
    /**
     * Registers the callback the reader invokes on card removal. A reader holds
     * a single callback; connecting again replaces it.
     */
    connectRemovalApi(readerApi: WaitForCardRemovalAutonomousReaderApi): void;
}

/**
 * Open session with a card, as handed out by a driver
 */
export interface CardChannel {
    /** ATR or contactless equivalent captured at power-on */
    readonly powerOnData: Buffer;
    /** False once closed or once the card left */
    readonly connected: boolean;

    transmit(command: Buffer): Promise<Buffer>;

    close(): Promise<void>;
}

/**
 * Source of asynchronous card removal events
 */
export interface RemovalEventSource {
    /**
     * Subscribe to removals
     * @returns Function cancelling the subscription
     */
    watch(listener: () => void): () => void;
}

/**
 * Hardware access used by the reader implementations
 */
export interface ReaderDriver {
    readonly name: string;
    /** Set when the hardware knows its coupling before any card is seen */
    readonly contactless?: boolean;
    /** Present when the hardware reports removals without being polled */
    readonly removalEvents?: RemovalEventSource;

    isCardPresent(): Promise<boolean>;

    openChannel(): Promise<CardChannel>;

    setProtocolEnabled?(readerProtocol: string, enabled: boolean): void;

    release?(): Promise<void>;
}

export interface AutonomousReaderDriver extends ReaderDriver {
    readonly removalEvents: RemovalEventSource;
}

/**
 * Options for the reader implementations
 */
export interface ReaderOptions {
    /** Defaults to the driver name */
    name?: string;
    /** Supported protocols, in matching order. Default: PCSC_PROTOCOL_RULES */
    protocols?: readonly ProtocolRule[];
    /** Forces the contactless flag instead of deriving it */
    contactless?: boolean;
    /** Reader names treated as contactless while no card has been seen */
    contactlessNamePattern?: RegExp;
    chaining?: ChainingStrategy;
    /** Upper bound on follow-up commands for one APDU. Default: 64 */
    maxChainedCommands?: number;
    logger?: Logger;
}

// ---------------------------------------------------------------------------
// PC/SC host objects, as exposed by native PC/SC bindings
// ---------------------------------------------------------------------------

/**
 * Options for card.transmit()
 */
export interface TransmitOptions {
    /**
     * Maximum receive buffer size in bytes.
     * Default: 258 (standard APDU: 256 data + 2 status bytes)
     */
    maxRecvLength?: number;
}

/**
 * Represents a connected smart card
 */
export interface PcscCard {
    /** The active protocol (T0, T1, or RAW) */
    readonly protocol: number;
    /** Whether the card is still connected */
    readonly connected: boolean;
    /** The card's ATR (Answer To Reset) */
    readonly atr: Buffer | null;

    transmit(
        command: Buffer | number[],
        options?: TransmitOptions
    ): Promise<Buffer>;

    disconnect(disposition?: number): void;
}

/**
 * Represents a smart card reader
 */
export interface PcscReader {
    readonly name: string;
    /** Current reader state flags */
    readonly state: number;
    /** ATR of the card if present */
    readonly atr: Buffer | null;

    connect(shareMode?: number, protocol?: number): Promise<PcscCard>;
}

/**
 * Low-level PC/SC context
 */
export interface PcscContext {
    readonly isValid: boolean;

    listReaders(): PcscReader[];
}

/**
 * Monitor event from native ReaderMonitor
 */
export interface MonitorEvent {
    type:
        | 'reader-attached'
        | 'reader-detached'
        | 'card-inserted'
        | 'card-removed'
        | 'error';
    reader: string;
    state: number;
    atr: Buffer | null;
}

/**
 * Native PC/SC event monitor, running on a background thread
 */
export interface PcscReaderMonitor {
    readonly isRunning: boolean;

    start(callback: (event: MonitorEvent) => void): void;

    stop(): void;
}

/**
 * PC/SC constants, which differ between platforms and bindings
 */
export interface PcscConstants {
    SCARD_STATE_PRESENT: number;
    SCARD_SHARE_SHARED: number;
    SCARD_PROTOCOL_T0: number;
    SCARD_PROTOCOL_T1: number;
    SCARD_LEAVE_CARD: number;
}

export interface PcscDriverOptions {
    context: PcscContext;
    readerName: string;
    /** Enables autonomous removal events */
    monitor?: PcscReaderMonitor;
    constants?: Partial<PcscConstants>;
    maxRecvLength?: number;
    contactless?: boolean;
    logger?: Logger;
}
