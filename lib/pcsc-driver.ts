import {
    ReaderCommunicationError,
    ReaderUnavailableError,
    isUnresponsiveCardError,
    toCommunicationError,
} from './errors';
import { createLogger, type Logger } from './logger';
import type {
    CardChannel,
    MonitorEvent,
    PcscCard,
    PcscConstants,
    PcscContext,
    PcscDriverOptions,
    PcscReader,
    PcscReaderMonitor,
    ReaderDriver,
    RemovalEventSource,
} from './types';

/**
 * Standard PC/SC values, as defined by pcsc-lite and WinSCard
 */
export const DEFAULT_PCSC_CONSTANTS: PcscConstants = {
    SCARD_STATE_PRESENT: 0x20,
    SCARD_SHARE_SHARED: 2,
    SCARD_PROTOCOL_T0: 1,
    SCARD_PROTOCOL_T1: 2,
    SCARD_LEAVE_CARD: 0,
};

/**
 * Card channel over a connected PC/SC card
 */
class PcscCardChannel implements CardChannel {
    readonly powerOnData: Buffer;
    private readonly _card: PcscCard;
    private readonly _disposition: number;
    private readonly _maxRecvLength: number | undefined;

    constructor(
        card: PcscCard,
        powerOnData: Buffer,
        disposition: number,
        maxRecvLength: number | undefined
    ) {
        this._card = card;
        this.powerOnData = powerOnData;
        this._disposition = disposition;
        this._maxRecvLength = maxRecvLength;
    }

    get connected(): boolean {
        return this._card.connected;
    }

    transmit(command: Buffer): Promise<Buffer> {
        return this._maxRecvLength === undefined
            ? this._card.transmit(command)
            : this._card.transmit(command, { maxRecvLength: this._maxRecvLength });
    }

    async close(): Promise<void> {
        if (this._card.connected) {
            this._card.disconnect(this._disposition);
        }
    }
}

/**
 * Dispatches the events of one native ReaderMonitor to every driver using it.
 *
 * The binding reports all readers through a single callback, so drivers
 * sharing a monitor share its hub. The monitor is started with the first
 * subscription and stopped with the last one.
 */
class PcscMonitorHub {
    private static readonly _hubs = new WeakMap<PcscReaderMonitor, PcscMonitorHub>();

    static for(monitor: PcscReaderMonitor, logger: Logger): PcscMonitorHub {
        let hub = PcscMonitorHub._hubs.get(monitor);
        if (!hub) {
            hub = new PcscMonitorHub(monitor, logger);
            PcscMonitorHub._hubs.set(monitor, hub);
        }
        return hub;
    }

    // Keyed by reader name
    private readonly _subscribers = new Map<string, Set<() => void>>();
    private _started = false;

    private constructor(
        private readonly _monitor: PcscReaderMonitor,
        private readonly _logger: Logger
    ) {}

    subscribe(readerName: string, listener: () => void): () => void {
        if (!this._started) {
            this._start();
        }
        let listeners = this._subscribers.get(readerName);
        if (!listeners) {
            listeners = new Set();
            this._subscribers.set(readerName, listeners);
        }
        listeners.add(listener);

        return () => {
            const current = this._subscribers.get(readerName);
            if (!current?.delete(listener)) {
                return;
            }
            if (current.size === 0) {
                this._subscribers.delete(readerName);
            }
            if (this._subscribers.size === 0) {
                this._stop();
            }
        };
    }

    private _start(): void {
        // The callback of a monitor started elsewhere cannot be shared
        if (this._monitor.isRunning) {
            throw new ReaderCommunicationError(
                'PC/SC reader monitor is already running outside the drivers'
            );
        }
        this._monitor.start((event: MonitorEvent) => {
            this._dispatch(event);
        });
        this._started = true;
    }

    private _stop(): void {
        this._started = false;
        if (this._monitor.isRunning) {
            this._monitor.stop();
        }
    }

    private _dispatch(event: MonitorEvent): void {
        if (event.type === 'error') {
            // reader contains error message for error events
            this._logger.warn('Reader monitor error', { error: event.reader });
            return;
        }
        if (event.type !== 'card-removed' && event.type !== 'reader-detached') {
            return;
        }
        const listeners = this._subscribers.get(event.reader);
        if (listeners) {
            for (const listener of [...listeners]) {
                listener();
            }
        }
    }
}

/**
 * Removal events of one reader. A detached reader counts as a removal.
 */
class PcscRemovalEvents implements RemovalEventSource {
    private readonly _listeners = new Set<() => void>();
    private _unsubscribe: (() => void) | null = null;

    constructor(
        private readonly _hub: PcscMonitorHub,
        private readonly _readerName: string
    ) {}

    watch(listener: () => void): () => void {
        if (this._unsubscribe === null) {
            this._unsubscribe = this._hub.subscribe(this._readerName, () =>
                this._notify()
            );
        }
        this._listeners.add(listener);
        return () => {
            this._listeners.delete(listener);
            if (this._listeners.size === 0) {
                this.stop();
            }
        };
    }

    stop(): void {
        this._listeners.clear();
        const unsubscribe = this._unsubscribe;
        this._unsubscribe = null;
        unsubscribe?.();
    }

    private _notify(): void {
        for (const listener of [...this._listeners]) {
            listener();
        }
    }
}

/**
 * Driver for one reader of a PC/SC context
 *
 * The context, and the monitor when removal events are wanted, come from a
 * native PC/SC binding.
 */
export class PcscDriver implements ReaderDriver {
    readonly name: string;
    readonly contactless: boolean | undefined;
    readonly removalEvents: RemovalEventSource | undefined;

    private readonly _context: PcscContext;
    private readonly _constants: PcscConstants;
    private readonly _maxRecvLength: number | undefined;
    private readonly _removalEvents: PcscRemovalEvents | null;
    private readonly _logger: Logger;

    constructor(options: PcscDriverOptions) {
        this.name = options.readerName;
        this.contactless = options.contactless;
        this._context = options.context;
        this._constants = { ...DEFAULT_PCSC_CONSTANTS, ...options.constants };
        this._maxRecvLength = options.maxRecvLength;
        this._logger = (options.logger ?? createLogger('pcsc')).child({
            reader: options.readerName,
        });
        this._removalEvents = options.monitor
            ? new PcscRemovalEvents(
                  PcscMonitorHub.for(options.monitor, this._logger),
                  this.name
              )
            : null;
        this.removalEvents = this._removalEvents ?? undefined;
    }

    async isCardPresent(): Promise<boolean> {
        const reader = this._findReader();
        return (reader.state & this._constants.SCARD_STATE_PRESENT) !== 0;
    }

    async openChannel(): Promise<CardChannel> {
        const reader = this._findReader();
        const card = await this._connect(reader);
        const powerOnData = card.atr ?? reader.atr ?? Buffer.alloc(0);
        return new PcscCardChannel(
            card,
            powerOnData,
            this._constants.SCARD_LEAVE_CARD,
            this._maxRecvLength
        );
    }

    async release(): Promise<void> {
        this._removalEvents?.stop();
    }

    private _findReader(): PcscReader {
        if (!this._context.isValid) {
            throw new ReaderCommunicationError('PC/SC context is not valid');
        }
        let readers: PcscReader[];
        try {
            readers = this._context.listReaders();
        } catch (err) {
            throw toCommunicationError(err, 'reader', 'Unable to list readers');
        }
        const reader = readers.find((r) => r.name === this.name);
        if (!reader) {
            throw new ReaderUnavailableError(`Reader ${this.name} is not attached`);
        }
        return reader;
    }

    private async _connect(reader: PcscReader): Promise<PcscCard> {
        const { SCARD_SHARE_SHARED, SCARD_PROTOCOL_T0, SCARD_PROTOCOL_T1 } =
            this._constants;
        try {
            // First try with both T=0 and T=1 protocols
            return await reader.connect(
                SCARD_SHARE_SHARED,
                SCARD_PROTOCOL_T0 | SCARD_PROTOCOL_T1
            );
        } catch (dualProtocolErr) {
            // Some cards only answer when T=0 is requested alone
            if (!isUnresponsiveCardError(dualProtocolErr)) {
                throw dualProtocolErr;
            }
            this._logger.debug('Dual protocol connect failed, retrying with T=0');
            return reader.connect(SCARD_SHARE_SHARED, SCARD_PROTOCOL_T0);
        }
    }
}
