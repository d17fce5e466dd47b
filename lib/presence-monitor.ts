import { EventEmitter, once } from 'events';
import { setTimeout as delay } from 'timers/promises';
import {
    getRemovalDetection,
    isWaitForCardRemovalAutonomous,
    type RemovalDetection,
} from './capabilities';
import { CardRemovedError } from './errors';
import { createLogger, type Logger } from './logger';
import type { ReaderSpi } from './types';

export type CardState = 'NO_CARD' | 'CARD_PRESENT' | 'PROCESSING' | 'REMOVED';

export interface StateChange {
    from: CardState;
    to: CardState;
}

/**
 * Event types for CardPresenceMonitor
 */
export interface PresenceMonitorEvents {
    'state-changed': (change: StateChange) => void;
    'card-removed': () => void;
}

export interface PresenceMonitorOptions {
    /** Delay between presence checks in waitForCardRemoval. Default: 100 ms */
    pollInterval?: number;
    logger?: Logger;
}

export interface WaitOptions {
    signal?: AbortSignal;
}

/**
 * Drives the card state of one reader and surfaces each removal once.
 *
 * States: NO_CARD → CARD_PRESENT → PROCESSING → REMOVED → NO_CARD.
 * Readers with the polling capability are checked after every APDU; readers
 * with the autonomous capability report removals through their callback at
 * any time, including while an exchange is pending.
 *
 * Events:
 * - 'state-changed': Emitted on every transition
 * - 'card-removed': Emitted once per removal
 */
export class CardPresenceMonitor extends EventEmitter {
    readonly removalDetection: RemovalDetection;

    private readonly _reader: ReaderSpi;
    private readonly _pollInterval: number;
    private readonly _logger: Logger;
    private _state: CardState = 'NO_CARD';
    // Aborted on dispose so that pending waits settle
    private readonly _disposal = new AbortController();

    constructor(reader: ReaderSpi, options: PresenceMonitorOptions = {}) {
        super();
        this._reader = reader;
        this._pollInterval = options.pollInterval ?? 100;
        this._logger = (options.logger ?? createLogger('presence')).child({
            reader: reader.getName(),
        });
        this.removalDetection = getRemovalDetection(reader);

        if (isWaitForCardRemovalAutonomous(reader)) {
            reader.connectRemovalApi({
                onCardRemoved: () => this._handleRemoval('autonomous'),
            });
        }
    }

    get state(): CardState {
        return this._state;
    }

    get reader(): ReaderSpi {
        return this._reader;
    }

    /**
     * Handle an insertion signalled by the hardware layer.
     *
     * @returns True if the reader confirmed the card and the state moved to
     *          CARD_PRESENT
     */
    async cardInserted(): Promise<boolean> {
        if (this._state !== 'NO_CARD') {
            this._logger.debug('Insertion ignored', { state: this._state });
            return false;
        }
        const present = await this._reader.checkCardPresence();
        if (present && this._state === 'NO_CARD') {
            this._transition('CARD_PRESENT');
            return true;
        }
        return false;
    }

    /**
     * Open the physical channel and start exchanging APDUs
     */
    async startProcessing(): Promise<void> {
        this._expectState('CARD_PRESENT', 'start processing');
        await this._reader.openPhysicalChannel();
        if (this._state === 'CARD_PRESENT') {
            this._transition('PROCESSING');
        }
    }

    /**
     * Transmit an APDU. Polling readers are checked for presence afterwards;
     * a missing card moves the monitor to REMOVED.
     */
    async transmitApdu(apdu: Buffer | number[]): Promise<Buffer> {
        if (this._state === 'REMOVED') {
            throw new CardRemovedError('Card was removed');
        }
        this._expectState('PROCESSING', 'transmit APDU');

        let response: Buffer;
        try {
            response = await this._reader.transmitApdu(apdu);
        } catch (err) {
            if (this.removalDetection === 'polling') {
                await this.checkRemoval().catch((checkErr: unknown) => {
                    this._logger.error('Presence check after failed transmit', checkErr);
                });
            }
            throw err;
        }

        if (this.removalDetection === 'polling') {
            await this.checkRemoval();
        }
        return response;
    }

    /**
     * Check the card is still there
     *
     * @returns True if the card has been removed
     */
    async checkRemoval(): Promise<boolean> {
        if (this._state !== 'CARD_PRESENT' && this._state !== 'PROCESSING') {
            return this._state === 'REMOVED';
        }
        const present = await this._reader.checkCardPresence();
        if (!present) {
            this._handleRemoval('polling');
        }
        return this.state === 'REMOVED';
    }

    /**
     * Wait until the card is removed. Autonomous readers are awaited on
     * their callback, other readers are polled every `pollInterval` ms.
     */
    async waitForCardRemoval(options: WaitOptions = {}): Promise<void> {
        if (this._state === 'NO_CARD') {
            throw new Error('No card to wait for');
        }

        const controller = new AbortController();
        const abort = (): void => controller.abort();
        const sources = [this._disposal.signal, options.signal];
        for (const source of sources) {
            if (source?.aborted) {
                controller.abort();
            }
            source?.addEventListener('abort', abort, { once: true });
        }
        const { signal } = controller;

        try {
            signal.throwIfAborted();
            if (this.removalDetection === 'autonomous') {
                if (this._state !== 'REMOVED') {
                    await once(this, 'card-removed', { signal });
                }
                return;
            }

            while (!(await this.checkRemoval())) {
                await delay(this._pollInterval, undefined, { signal });
            }
        } finally {
            for (const source of sources) {
                source?.removeEventListener('abort', abort);
            }
        }
    }

    /**
     * End the card transaction, keeping the card in place
     */
    async finishProcessing(): Promise<void> {
        this._expectState('PROCESSING', 'finish processing');
        await this._reader.closePhysicalChannel();
        if (this._state === 'PROCESSING') {
            this._transition('CARD_PRESENT');
        }
    }

    /**
     * Consume the removal: close the channel and return to NO_CARD
     */
    async acknowledgeRemoval(): Promise<void> {
        this._expectState('REMOVED', 'acknowledge removal');
        await this._reader.closePhysicalChannel();
        this._transition('NO_CARD');
    }

    /**
     * Unregister the reader and drop all listeners
     */
    async dispose(): Promise<void> {
        this._disposal.abort();
        try {
            await this._reader.unregister();
        } finally {
            this.removeAllListeners();
        }
    }

    private _handleRemoval(source: 'autonomous' | 'polling'): void {
        if (this._state !== 'CARD_PRESENT' && this._state !== 'PROCESSING') {
            this._logger.debug('Removal ignored', { source, state: this._state });
            return;
        }
        this._logger.debug('Card removal detected', { source });
        this._transition('REMOVED');
        this.emit('card-removed');
    }

    private _transition(to: CardState): void {
        const from = this._state;
        this._state = to;
        this.emit('state-changed', { from, to });
    }

    private _expectState(expected: CardState, action: string): void {
        if (this._state !== expected) {
            throw new Error(
                `Cannot ${action} in state ${this._state}, expected ${expected}`
            );
        }
    }

    // Type-safe event emitter overrides
    on<K extends keyof PresenceMonitorEvents>(
        event: K,
        listener: PresenceMonitorEvents[K]
    ): this {
        return super.on(event, listener);
    }

    once<K extends keyof PresenceMonitorEvents>(
        event: K,
        listener: PresenceMonitorEvents[K]
    ): this {
        return super.once(event, listener);
    }

    off<K extends keyof PresenceMonitorEvents>(
        event: K,
        listener: PresenceMonitorEvents[K]
    ): this {
        return super.off(event, listener);
    }

    emit<K extends keyof PresenceMonitorEvents>(
        event: K,
        ...args: Parameters<PresenceMonitorEvents[K]>
    ): boolean {
        return super.emit(event, ...args);
    }
}
