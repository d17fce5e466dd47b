import type {
    AutonomousReaderDriver,
    ReaderDriver,
    ReaderSpi,
    WaitForCardRemovalAutonomousSpi,
    WaitForCardRemovalDuringProcessingSpi,
} from './types';

export type RemovalDetection = 'autonomous' | 'polling' | 'none';

/**
 * Check if a reader detects removals by presence checks between APDUs
 */
export function isWaitForCardRemovalDuringProcessing(
    reader: ReaderSpi
): reader is ReaderSpi & WaitForCardRemovalDuringProcessingSpi {
    return (
        'detectsCardRemovalDuringProcessing' in reader &&
        reader.detectsCardRemovalDuringProcessing === true
    );
}

/**
 * Check if a reader reports removals on its own
 */
export function isWaitForCardRemovalAutonomous(
    reader: ReaderSpi
): reader is ReaderSpi & WaitForCardRemovalAutonomousSpi {
    return (
        'connectRemovalApi' in reader &&
        typeof reader.connectRemovalApi === 'function'
    );
}

/**
 * Removal detection mode of a reader. A reader advertising both
 * capabilities is driven autonomously.
 */
export function getRemovalDetection(reader: ReaderSpi): RemovalDetection {
    if (isWaitForCardRemovalAutonomous(reader)) {
        return 'autonomous';
    }
    if (isWaitForCardRemovalDuringProcessing(reader)) {
        return 'polling';
    }
    return 'none';
}

export function hasRemovalEvents(
    driver: ReaderDriver
): driver is AutonomousReaderDriver {
    return driver.removalEvents !== undefined;
}
