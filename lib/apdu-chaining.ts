/**
 * Response chaining for APDU exchanges
 *
 * Handles automatic GET RESPONSE (SW1=61) and Le correction (SW1=6C) so that
 * callers only ever see the complete response.
 */

import {
    CardCommunicationError,
    SCARD_E_NOT_TRANSACTED,
    toCommunicationError,
} from './errors';

export const DEFAULT_MAX_CHAINED_COMMANDS = 64;

/**
 * Sends one command to the card and returns its raw response
 */
export type ApduExchange = (command: Buffer) => Promise<Buffer>;

/**
 * Decides whether a response calls for a follow-up command
 */
export interface ChainingStrategy {
    /**
     * @param command The command that produced `response`
     * @param response Raw response, status word included
     * @returns The follow-up command, or null when the response is complete
     */
    nextCommand(command: Buffer, response: Buffer): Buffer | null;
}

export interface Iso7816ChainingOptions {
    /** Class byte of GET RESPONSE. Default: 0x00 */
    getResponseClass?: number;
    /** Re-issue commands answered with 6Cxx. Default: true */
    correctLe?: boolean;
}

/**
 * Build a GET RESPONSE APDU command (CLA C0 00 00 Le)
 *
 * @param bytesAvailable Number of bytes to retrieve (Le value, 0 meaning 256)
 */
export function buildGetResponseCommand(
    bytesAvailable: number,
    cla = 0x00
): Buffer {
    return Buffer.from([cla, 0xc0, 0x00, 0x00, bytesAvailable]);
}

/**
 * Correct the Le value in an APDU command
 *
 * @param command Original command buffer
 * @param newLe Corrected Le value from SW2
 * @returns New command buffer with corrected Le
 */
export function correctLeInCommand(command: Buffer, newLe: number): Buffer {
    if (command.length === 4) {
        // Case 1: No Le in original, append it
        return Buffer.concat([command, Buffer.from([newLe])]);
    }
    // Case 2/4: Le is the last byte
    const newCmd = Buffer.from(command);
    newCmd[newCmd.length - 1] = newLe;
    return newCmd;
}

/**
 * ISO 7816-4 chaining: `61xy` is followed by GET RESPONSE with Le = xy,
 * `6Cxx` repeats the command with Le = xx
 */
export class Iso7816Chaining implements ChainingStrategy {
    private readonly _cla: number;
    private readonly _correctLe: boolean;

    constructor(options: Iso7816ChainingOptions = {}) {
        this._cla = options.getResponseClass ?? 0x00;
        this._correctLe = options.correctLe ?? true;
    }

    nextCommand(command: Buffer, response: Buffer): Buffer | null {
        if (response.length < 2) {
            return null;
        }
        const sw1 = response[response.length - 2];
        const sw2 = response[response.length - 1];

        if (sw1 === 0x61) {
            return buildGetResponseCommand(sw2, this._cla);
        }
        if (sw1 === 0x6c && this._correctLe && response.length === 2) {
            return correctLeInCommand(command, sw2);
        }
        return null;
    }
}

export const ISO7816_CHAINING: ChainingStrategy = new Iso7816Chaining();

function checkResponse(response: Buffer): Buffer {
    if (response.length < 2) {
        throw new CardCommunicationError(
            `Malformed response: expected at least 2 bytes, got ${response.length}`,
            SCARD_E_NOT_TRANSACTED
        );
    }
    return response;
}

/**
 * Transmit an APDU and follow the chain of responses until it is complete
 *
 * @returns Data of every intermediate response followed by the final response
 * @throws CardCommunicationError if a follow-up command fails or the chain
 *         exceeds `maxChainedCommands`
 */
export async function transmitWithChaining(
    exchange: ApduExchange,
    command: Buffer,
    strategy: ChainingStrategy = ISO7816_CHAINING,
    maxChainedCommands = DEFAULT_MAX_CHAINED_COMMANDS
): Promise<Buffer> {
    let sent = command;
    let response = checkResponse(await exchange(sent));

    const collectedData: Buffer[] = [];
    let followUps = 0;

    for (
        let next = strategy.nextCommand(sent, response);
        next !== null;
        next = strategy.nextCommand(sent, response)
    ) {
        followUps++;
        if (followUps > maxChainedCommands) {
            throw new CardCommunicationError(
                `Response chain exceeded ${maxChainedCommands} follow-up commands`,
                SCARD_E_NOT_TRANSACTED
            );
        }

        // Collect any data before the status word
        if (response.length > 2) {
            collectedData.push(response.subarray(0, response.length - 2));
        }

        sent = next;
        try {
            response = checkResponse(await exchange(sent));
        } catch (err) {
            throw toCommunicationError(
                err,
                'card',
                'Card stopped responding during response chaining'
            );
        }
    }

    if (collectedData.length > 0) {
        collectedData.push(response);
        return Buffer.concat(collectedData);
    }

    return response;
}
