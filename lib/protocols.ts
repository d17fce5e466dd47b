/**
 * Reader protocols and the rules identifying them from power-on data
 */

export const ReaderProtocol = {
    ISO_7816_3: 'ISO_7816_3',
    ISO_14443_4: 'ISO_14443_4',
    MIFARE_CLASSIC: 'MIFARE_CLASSIC',
    MIFARE_ULTRALIGHT: 'MIFARE_ULTRALIGHT',
    FELICA: 'FELICA',
} as const;

export type ReaderProtocolName =
    (typeof ReaderProtocol)[keyof typeof ReaderProtocol];

/**
 * Identifies a protocol by matching the upper-case hex power-on data
 */
export interface ProtocolRule {
    readonly name: string;
    readonly atrPattern: RegExp;
    readonly contactless: boolean;
}

// PC/SC part 3 storage card ATR: 3B 8F 80 01 80 4F 0C A0 00 00 03 06 SS NN NN ...
const STORAGE_CARD_PREFIX = '^3B8F8001804F0CA000000306';

export const CONTACTLESS_PROTOCOL_RULES: readonly ProtocolRule[] = [
    {
        name: ReaderProtocol.MIFARE_CLASSIC,
        atrPattern: new RegExp(`${STORAGE_CARD_PREFIX}0300(01|02)`),
        contactless: true,
    },
    {
        name: ReaderProtocol.MIFARE_ULTRALIGHT,
        atrPattern: new RegExp(`${STORAGE_CARD_PREFIX}030003`),
        contactless: true,
    },
    {
        name: ReaderProtocol.FELICA,
        atrPattern: new RegExp(`${STORAGE_CARD_PREFIX}11`),
        contactless: true,
    },
    {
        name: ReaderProtocol.ISO_14443_4,
        atrPattern: /^3B8[0-9A-F]8001/,
        contactless: true,
    },
];

export const CONTACT_PROTOCOL_RULES: readonly ProtocolRule[] = [
    {
        name: ReaderProtocol.ISO_7816_3,
        atrPattern: /^3[BF]/,
        contactless: false,
    },
];

/**
 * Default rules for PC/SC readers. Order matters: the first match wins.
 */
export const PCSC_PROTOCOL_RULES: readonly ProtocolRule[] = [
    ...CONTACTLESS_PROTOCOL_RULES,
    ...CONTACT_PROTOCOL_RULES,
];

/**
 * Find the rule matching the power-on data of a card
 */
export function resolveProtocol(
    powerOnData: Buffer,
    rules: readonly ProtocolRule[]
): ProtocolRule | null {
    if (powerOnData.length === 0) {
        return null;
    }
    const hex = powerOnData.toString('hex').toUpperCase();
    return rules.find((rule) => rule.atrPattern.test(hex)) ?? null;
}
