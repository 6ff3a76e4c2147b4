export * from './shared/types/LockTypes';
export { QueueLock } from './core/QueueLock';
export { FutureGuard } from './core/FutureGuard';
export { Guard } from './core/Guard';
export { LockRequest } from './domain/LockRequest';
export { SharedState } from './domain/SharedState';
export { ValueCell } from './domain/ValueCell';
export { createNotifier, NotifierSender, NotifierReceiver } from './shared/concurrency/Notifier';
export type { NotifierChannel } from './shared/concurrency/Notifier';
export { PendingQueue } from './shared/concurrency/PendingQueue';
export { AtomicStatus, LockStatus } from './shared/concurrency/AtomicStatus';
export { LockError, ErrorCode, isLockError } from './shared/errors/LockError';
export { Logger, defaultLogger } from './shared/logging/Logger';
export type { LogLevel, LogEntry, LogHandler, LoggerConfig } from './shared/logging/Logger';
export { using, isDisposable } from './shared/utils/Disposable';
export type { Disposable } from './shared/utils/Disposable';
export { resolveLockOptions, DEFAULT_LOCK_OPTIONS } from './application/config/LockConfigBuilder';
