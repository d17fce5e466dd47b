// Readers
export {
    LocalReader,
    PollingReader,
    AutonomousReader,
    createReader,
} from './local-reader';

// Capability checks
export {
    isWaitForCardRemovalDuringProcessing,
    isWaitForCardRemovalAutonomous,
    getRemovalDetection,
    hasRemovalEvents,
} from './capabilities';
export type { RemovalDetection } from './capabilities';

// Presence monitoring
export { CardPresenceMonitor } from './presence-monitor';
export type {
    CardState,
    StateChange,
    PresenceMonitorEvents,
    PresenceMonitorOptions,
    WaitOptions,
} from './presence-monitor';

// Response chaining
export {
    Iso7816Chaining,
    ISO7816_CHAINING,
    DEFAULT_MAX_CHAINED_COMMANDS,
    buildGetResponseCommand,
    correctLeInCommand,
    transmitWithChaining,
} from './apdu-chaining';
export type {
    ApduExchange,
    ChainingStrategy,
    Iso7816ChainingOptions,
} from './apdu-chaining';

// Protocols
export {
    ReaderProtocol,
    PCSC_PROTOCOL_RULES,
    CONTACT_PROTOCOL_RULES,
    CONTACTLESS_PROTOCOL_RULES,
    resolveProtocol,
} from './protocols';
export type { ProtocolRule, ReaderProtocolName } from './protocols';

// Drivers
export { PcscDriver, DEFAULT_PCSC_CONSTANTS } from './pcsc-driver';
export { VirtualTerminal, VirtualCard, toBuffer } from './virtual-terminal';
export type {
    ByteSource,
    VirtualCardOptions,
    VirtualCardResponse,
    VirtualTerminalOptions,
} from './virtual-terminal';

// Errors
export {
    CommunicationError,
    ReaderCommunicationError,
    CardCommunicationError,
    CardRemovedError,
    UnresponsiveCardError,
    TimeoutError,
    ServiceNotRunningError,
    ReaderUnavailableError,
    SharingViolationError,
    createCommunicationError,
    toCommunicationError,
    isCardRemovedError,
    isUnresponsiveCardError,
} from './errors';
export type { FailureSide } from './errors';

// Logging
export { Logger, createLogger, defaultLogLevel, LOG_LEVEL_ENV } from './logger';
export type { LogLevel, LogContext } from './logger';

// Types
export type {
    ReaderSpi,
    WaitForCardRemovalDuringProcessingSpi,
    WaitForCardRemovalAutonomousSpi,
    WaitForCardRemovalAutonomousReaderApi,
    CardChannel,
    RemovalEventSource,
    ReaderDriver,
    AutonomousReaderDriver,
    ReaderOptions,
    TransmitOptions,
    PcscCard,
    PcscReader,
    PcscContext,
    PcscReaderMonitor,
    PcscConstants,
    PcscDriverOptions,
    MonitorEvent,
} from './types';
