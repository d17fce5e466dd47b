/**
 * Reader implementations over a {@link ReaderDriver}
 *
 * `LocalReader` owns the channel, protocol and card state. `PollingReader`
 * and `AutonomousReader` add the two removal-detection capabilities.
 */

import {
    DEFAULT_MAX_CHAINED_COMMANDS,
    ISO7816_CHAINING,
    transmitWithChaining,
    type ChainingStrategy,
} from './apdu-chaining';
import { hasRemovalEvents } from './capabilities';
import {
    CardCommunicationError,
    CardRemovedError,
    ReaderCommunicationError,
    SCARD_E_NOT_TRANSACTED,
    SCARD_E_READER_UNAVAILABLE,
    UnresponsiveCardError,
    isCardRemovedError,
    toCommunicationError,
} from './errors';
import { createLogger, type Logger } from './logger';
import {
    PCSC_PROTOCOL_RULES,
    resolveProtocol,
    type ProtocolRule,
} from './protocols';
import type {
    AutonomousReaderDriver,
    CardChannel,
    ReaderDriver,
    ReaderOptions,
    ReaderSpi,
    RemovalEventSource,
    WaitForCardRemovalAutonomousReaderApi,
    WaitForCardRemovalAutonomousSpi,
    WaitForCardRemovalDuringProcessingSpi,
} from './types';

const DEFAULT_CONTACTLESS_NAME_PATTERN = /contactless|picc|nfc|acr122/i;

/**
 * Card known to the reader, cleared on removal
 */
interface InsertedCard {
    readonly powerOnData: Buffer;
    readonly rule: ProtocolRule | null;
}

/**
 * Reader without a removal-detection capability of its own
 */
export class LocalReader implements ReaderSpi {
    protected readonly _driver: ReaderDriver;
    protected readonly _logger: Logger;

    private readonly _name: string;
    private readonly _rules: readonly ProtocolRule[];
    private readonly _activated = new Map<string, boolean>();
    private readonly _chaining: ChainingStrategy;
    private readonly _maxChainedCommands: number;
    private readonly _contactless: boolean | undefined;
    private readonly _contactlessNamePattern: RegExp;

    private _channel: CardChannel | null = null;
    private _card: InsertedCard | null = null;
    private _cardPresent = false;
    // Bumped on every opening and removal, checked by in-flight exchanges
    private _cycle = 0;
    private _unregistered = false;

    constructor(driver: ReaderDriver, options: ReaderOptions = {}) {
        const name = options.name ?? driver.name;
        if (name.length === 0) {
            throw new TypeError('Reader name must not be empty');
        }

        this._driver = driver;
        this._name = name;
        this._rules = options.protocols ?? PCSC_PROTOCOL_RULES;
        for (const rule of this._rules) {
            this._activated.set(rule.name, false);
        }
        this._chaining = options.chaining ?? ISO7816_CHAINING;
        this._maxChainedCommands =
            options.maxChainedCommands ?? DEFAULT_MAX_CHAINED_COMMANDS;
        this._contactless = options.contactless;
        this._contactlessNamePattern =
            options.contactlessNamePattern ?? DEFAULT_CONTACTLESS_NAME_PATTERN;
        this._logger = (options.logger ?? createLogger('reader')).child({
            reader: name,
        });
    }

    getName(): string {
        return this._name;
    }

    isProtocolSupported(readerProtocol: string): boolean {
        return this._activated.has(readerProtocol);
    }

    activateProtocol(readerProtocol: string): void {
        this._setProtocolActivation(readerProtocol, true);
    }

    deactivateProtocol(readerProtocol: string): void {
        this._setProtocolActivation(readerProtocol, false);
    }

    isProtocolActivated(readerProtocol: string): boolean {
        return this._activated.get(readerProtocol) ?? false;
    }

    isCurrentProtocol(readerProtocol: string): boolean {
        if (!this._cardPresent || this._card === null) {
            return false;
        }
        return this._card.rule?.name === readerProtocol;
    }

    async openPhysicalChannel(): Promise<void> {
        this._assertRegistered();
        if (this.isPhysicalChannelOpen()) {
            return;
        }
        this._channel = null;

        const cycle = this._cycle;
        let channel: CardChannel;
        try {
            channel = await this._driver.openChannel();
        } catch (err) {
            throw toCommunicationError(
                err,
                'reader',
                `Unable to open physical channel on ${this._name}`
            );
        }

        if (this._unregistered) {
            await this._closeQuietly(channel, 'unregistered while opening');
            this._assertRegistered();
        }
        if (cycle !== this._cycle || !channel.connected) {
            if (channel.connected) {
                await this._closeQuietly(channel, 'card removed while opening');
            }
            throw new CardRemovedError(
                `Card was removed from ${this._name} while opening the channel`
            );
        }
        if (channel.powerOnData.length === 0) {
            await this._closeQuietly(channel, 'empty power-on data');
            throw new UnresponsiveCardError(
                `Card in ${this._name} returned no power-on data`
            );
        }

        const powerOnData = Buffer.from(channel.powerOnData);
        const rule = resolveProtocol(powerOnData, this._rules);

        this._cycle++;
        this._channel = channel;
        this._card = { powerOnData, rule };
        this._markCardPresent();

        this._logger.debug('Physical channel opened', {
            powerOnData: powerOnData.toString('hex'),
            protocol: rule?.name ?? null,
        });
    }

    async closePhysicalChannel(): Promise<void> {
        const channel = this._channel;
        if (channel === null) {
            return;
        }
        this._channel = null;

        if (!channel.connected) {
            this._logger.debug('Physical channel already closed');
            return;
        }

        try {
            await channel.close();
        } catch (err) {
            if (isCardRemovedError(err)) {
                this._handleCardAbsent('card removed before close');
                return;
            }
            throw toCommunicationError(
                err,
                'reader',
                `Unable to close physical channel on ${this._name}`
            );
        }
        this._logger.debug('Physical channel closed');
    }

    isPhysicalChannelOpen(): boolean {
        return this._channel !== null && this._channel.connected;
    }

    async checkCardPresence(): Promise<boolean> {
        this._assertRegistered();

        let present: boolean;
        try {
            present = await this._driver.isCardPresent();
        } catch (err) {
            const error = toCommunicationError(
                err,
                'reader',
                `Unable to check card presence on ${this._name}`
            );
            // A card-side failure while probing means there is no usable card
            if (!(error instanceof CardCommunicationError)) {
                throw error;
            }
            this._logger.debug('Presence probe failed on card side', {
                error: error.message,
            });
            present = false;
        }

        if (present) {
            this._markCardPresent();
        } else {
            this._handleCardAbsent('presence check');
        }
        return present;
    }

    getPowerOnData(): Buffer {
        return this._card ? Buffer.from(this._card.powerOnData) : Buffer.alloc(0);
    }

    async transmitApdu(apduIn: Buffer | number[]): Promise<Buffer> {
        const command = Buffer.isBuffer(apduIn) ? apduIn : Buffer.from(apduIn);
        if (command.length === 0) {
            throw new TypeError('APDU command must not be empty');
        }
        this._assertRegistered();

        const channel = this._channel;
        if (channel === null || !channel.connected) {
            throw new CardCommunicationError(
                `Physical channel of ${this._name} is not open`,
                SCARD_E_NOT_TRANSACTED
            );
        }

        const cycle = this._cycle;
        try {
            const response = await transmitWithChaining(
                (cmd) => this._exchange(channel, cycle, cmd),
                command,
                this._chaining,
                this._maxChainedCommands
            );
            this._logger.debug('APDU exchanged', {
                command: command.toString('hex'),
                response: response.toString('hex'),
            });
            return response;
        } catch (err) {
            if (cycle === this._cycle && isCardRemovedError(err)) {
                this._handleCardAbsent('card removed during transmit');
            }
            throw err;
        }
    }

    isContactless(): boolean {
        if (this._contactless !== undefined) {
            return this._contactless;
        }
        if (this._driver.contactless !== undefined) {
            return this._driver.contactless;
        }
        if (this._card?.rule) {
            return this._card.rule.contactless;
        }
        return this._contactlessNamePattern.test(this._name);
    }

    async unregister(): Promise<void> {
        if (this._unregistered) {
            return;
        }
        this._unregistered = true;
        this._onUnregister();

        const channel = this._channel;
        this._channel = null;
        this._card = null;
        this._cardPresent = false;
        this._cycle++;

        if (channel !== null && channel.connected) {
            await this._closeQuietly(channel, 'unregister');
        }

        if (this._driver.release) {
            try {
                await this._driver.release();
            } catch (err) {
                throw toCommunicationError(
                    err,
                    'reader',
                    `Unable to release ${this._name}`
                );
            }
        }
        this._logger.debug('Reader unregistered');
    }

    /**
     * Invoked when a card becomes known to the reader
     */
    protected _onCardInserted(): void {}

    /**
     * Invoked once when a known card is found to be gone
     */
    protected _onCardRemoved(): void {}

    protected _onUnregister(): void {}

    protected _assertRegistered(): void {
        if (this._unregistered) {
            throw new ReaderCommunicationError(
                `Reader ${this._name} is unregistered`,
                SCARD_E_READER_UNAVAILABLE
            );
        }
    }

    /**
     * Clear the card cache and drop the channel after a removal
     */
    protected _handleCardAbsent(reason: string): void {
        const wasPresent = this._cardPresent;
        const channel = this._channel;

        this._cardPresent = false;
        this._card = null;
        this._channel = null;
        // Even for a card never seen: an opening may be pending
        this._cycle++;

        if (channel !== null && channel.connected) {
            void this._closeQuietly(channel, reason);
        }
        if (wasPresent) {
            this._logger.debug('Card removed', { reason });
            this._onCardRemoved();
        }
    }

    private _markCardPresent(): void {
        if (!this._cardPresent) {
            this._cardPresent = true;
            this._onCardInserted();
        }
    }

    private _setProtocolActivation(
        readerProtocol: string,
        activated: boolean
    ): void {
        this._assertRegistered();
        if (!this.isProtocolSupported(readerProtocol)) {
            throw new TypeError(
                `Protocol ${readerProtocol} is not supported by ${this._name}`
            );
        }
        if (this._activated.get(readerProtocol) === activated) {
            return;
        }
        this._activated.set(readerProtocol, activated);
        this._driver.setProtocolEnabled?.(readerProtocol, activated);
        this._logger.debug(
            activated ? 'Protocol activated' : 'Protocol deactivated',
            { protocol: readerProtocol }
        );
    }

    private async _exchange(
        channel: CardChannel,
        cycle: number,
        command: Buffer
    ): Promise<Buffer> {
        let response: Buffer;
        try {
            response = await channel.transmit(command);
        } catch (err) {
            throw toCommunicationError(
                err,
                'card',
                `Transmit failed on ${this._name}`
            );
        }
        if (cycle !== this._cycle) {
            throw new CardRemovedError(
                `Card was removed from ${this._name} during APDU exchange`
            );
        }
        return response;
    }

    private async _closeQuietly(
        channel: CardChannel,
        reason: string
    ): Promise<void> {
        try {
            await channel.close();
        } catch (err) {
            this._logger.warn('Failed to close physical channel', {
                reason,
                error: err instanceof Error ? err.message : String(err),
            });
        }
    }
}

/**
 * Reader detecting removals through presence checks between APDUs
 */
export class PollingReader
    extends LocalReader
    implements WaitForCardRemovalDuringProcessingSpi
{
    readonly detectsCardRemovalDuringProcessing = true as const;
}

/**
 * Reader whose driver pushes removal events
 */
export class AutonomousReader
    extends LocalReader
    implements WaitForCardRemovalAutonomousSpi
{
    private readonly _removalEvents: RemovalEventSource;
    private _readerApi: WaitForCardRemovalAutonomousReaderApi | null = null;
    private _unwatch: (() => void) | null = null;
    private _removalNotified = false;

    constructor(driver: AutonomousReaderDriver, options: ReaderOptions = {}) {
        super(driver, options);
        this._removalEvents = driver.removalEvents;
    }

    connectRemovalApi(readerApi: WaitForCardRemovalAutonomousReaderApi): void {
        this._assertRegistered();
        if (this._unwatch === null) {
            this._unwatch = this._removalEvents.watch(() =>
                this._handleRemovalEvent()
            );
        }
        this._readerApi = readerApi;
    }

    protected _onCardInserted(): void {
        this._removalNotified = false;
    }

    protected _onCardRemoved(): void {
        this._notifyRemoval();
    }

    protected _onUnregister(): void {
        const unwatch = this._unwatch;
        this._unwatch = null;
        this._readerApi = null;
        unwatch?.();
    }

    private _handleRemovalEvent(): void {
        this._handleCardAbsent('removal event');
        // The card may have left before the reader ever saw it
        this._notifyRemoval();
    }

    private _notifyRemoval(): void {
        const readerApi = this._readerApi;
        if (this._removalNotified || readerApi === null) {
            return;
        }
        this._removalNotified = true;
        try {
            readerApi.onCardRemoved();
        } catch (err) {
            this._logger.error('Card removal callback failed', err);
        }
    }
}

/**
 * Create the reader matching what the driver can do
 */
export function createReader(
    driver: ReaderDriver,
    options: ReaderOptions = {}
): PollingReader | AutonomousReader {
    if (hasRemovalEvents(driver)) {
        return new AutonomousReader(driver, options);
    }
    return new PollingReader(driver, options);
}
