#!/usr/bin/env npx tsx
/**
 * Run a card session on a reader that detects removals by polling
 *
 * Usage: npx tsx examples/polling-transaction.ts
 *
 * A virtual terminal stands in for the hardware. The card answers SELECT
 * with 61 0C, so the reader fetches the rest with GET RESPONSE.
 */

import {
    CardPresenceMonitor,
    PollingReader,
    VirtualCard,
    VirtualTerminal,
    createLogger,
    isCardRemovedError,
} from '../lib';

const SELECT_MF = [0x00, 0xa4, 0x00, 0x00, 0x02, 0x3f, 0x00];

async function main(): Promise<void> {
    console.log('Polling Transaction Example');
    console.log('===========================\n');

    const terminal = new VirtualTerminal('Virtual Contact Reader');
    terminal.insertCard(
        new VirtualCard('3B 16 96 41 73 74 72 69 64', [
            { command: SELECT_MF, response: '61 0C' },
            {
                command: '00 C0 00 00 0C',
                response: '62 0A 82 01 38 83 02 3F 00 8A 01 05 90 00',
            },
        ])
    );

    const reader = new PollingReader(terminal);
    const monitor = new CardPresenceMonitor(reader, {
        logger: createLogger('example'),
    });
    monitor.on('state-changed', ({ from, to }) => {
        console.log(`State: ${from} -> ${to}`);
    });

    try {
        if (!(await monitor.cardInserted())) {
            console.log('No card inserted.');
            return;
        }
        console.log(`ATR: ${reader.getPowerOnData().toString('hex')}`);

        await monitor.startProcessing();
        const response = await monitor.transmitApdu(SELECT_MF);
        console.log(`FCP: ${response.toString('hex')}`);

        // Pull the card between two commands
        terminal.removeCard();
        await monitor.transmitApdu([0x00, 0xb0, 0x00, 0x00, 0x10]);
    } catch (err) {
        if (isCardRemovedError(err) || monitor.state === 'REMOVED') {
            console.log('Card removed during the session');
            await monitor.acknowledgeRemoval();
        } else {
            throw err;
        }
    } finally {
        await monitor.dispose();
    }
}

main().catch((err: unknown) => {
    console.error('Error:', err instanceof Error ? err.message : err);
    process.exit(1);
});
