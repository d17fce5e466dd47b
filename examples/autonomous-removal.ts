#!/usr/bin/env npx tsx
/**
 * Wait for a card removal reported by the reader itself
 *
 * Usage: npx tsx examples/autonomous-removal.ts [delay-ms]
 *
 * The virtual terminal pushes removal events like interrupt-capable
 * hardware. The card is pulled after `delay-ms` (default 500).
 */

import {
    AutonomousReader,
    CardPresenceMonitor,
    VirtualCard,
    VirtualTerminal,
    hasRemovalEvents,
} from '../lib';

async function main(): Promise<void> {
    const delayMs = parseInt(process.argv[2]) || 500;

    console.log('Autonomous Removal Example');
    console.log('==========================\n');

    const terminal = new VirtualTerminal('Virtual NFC Reader', {
        removalEvents: true,
    });
    terminal.insertCard(new VirtualCard('3B8880010000000033818100 3A'));
    if (!hasRemovalEvents(terminal)) {
        throw new Error('Terminal does not report removals');
    }

    const reader = new AutonomousReader(terminal);
    const monitor = new CardPresenceMonitor(reader);
    monitor.on('card-removed', () => {
        console.log('Card removed');
    });

    try {
        await monitor.cardInserted();
        await monitor.startProcessing();
        console.log(`Contactless: ${reader.isContactless()}`);

        const uid = await monitor.transmitApdu([0xff, 0xca, 0x00, 0x00, 0x00]);
        console.log(`Response: ${uid.toString('hex')}`);
        await monitor.finishProcessing();

        const timer = setTimeout(() => terminal.removeCard(), delayMs);
        console.log(`Waiting for removal (card pulled in ${delayMs} ms)...`);
        await monitor.waitForCardRemoval();
        clearTimeout(timer);

        await monitor.acknowledgeRemoval();
        console.log(`State: ${monitor.state}`);
    } finally {
        await monitor.dispose();
    }
}

main().catch((err: unknown) => {
    console.error('Error:', err instanceof Error ? err.message : err);
    process.exit(1);
});
