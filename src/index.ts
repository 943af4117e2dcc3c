/**
 * Public surface of the cause-list courier, for embedding it in another
 * process instead of running the CLI.
 */

export { buildCourier } from './courier';
export type { Courier } from './courier';
export { Scheduler, describeOutcome } from './scheduler';
export type { SchedulerOptions } from './scheduler';
export { CauseListWatcher, buildCaption } from './causeListWatcher';
export type { WatcherSettings } from './causeListWatcher';

export { ConfigError, loadCourierConfig } from './core/config';
export type { CourierConfig, DirectApiSettings, SessionChannelSettings } from './core/config';
export { DailyGate } from './core/dailyGate';
export { extractCauseListDate, parseDateToken, formatCauseListDate } from './core/dateExtractor';
export { QUALITY_PROFILES, getQualityProfile } from './core/qualityProfiles';
export { Logger } from './core/logger';
export type * from './core/types';

export { createSnapshotProvider } from './scrapers';
export type { SnapshotProvider } from './scrapers';
export { createDeliveryChannel, DirectApiChannel, SessionChannel } from './channels';
export type { DeliveryChannel, ChatSurface } from './channels';
export { BulkDispatcher } from './services/bulkDispatcher';
export { FileSentMarkerStore } from './services/sentMarkerStore';
export type { SentMarkerStore } from './services/sentMarkerStore';
export { FileSessionStore } from './agents/sessionManager';
export type { SessionStore } from './agents/sessionManager';
export { PairingBoard, startPairingServer } from './agents/pairingServer';
