import type {
  CancellationPolicy,
  LockOptions,
  ResolvedLockOptions,
} from "../../shared/types/LockTypes";
import { defaultLogger } from "../../shared/logging/Logger";
import { LockError, ErrorCode } from "../../shared/errors/LockError";

export const DEFAULT_LOCK_OPTIONS: Readonly<Pick<ResolvedLockOptions, "name" | "cancellationPolicy">> = {
  name: "",
  cancellationPolicy: "skip",
};

const CANCELLATION_POLICIES: readonly CancellationPolicy[] = ["skip", "strict"];

/**
 * 合并默认配置与调用方传入的配置
 *
 * 未指定 logger 时：有 name 则从 defaultLogger 派生带 lockId 的子 Logger，
 * 否则直接使用 defaultLogger。
 *
 * @throws {LockError} cancellationPolicy 取值非法
 */
export function resolveLockOptions(options: LockOptions = {}): ResolvedLockOptions {
  const cancellationPolicy = options.cancellationPolicy ?? DEFAULT_LOCK_OPTIONS.cancellationPolicy;
  if (!CANCELLATION_POLICIES.includes(cancellationPolicy)) {
    throw new LockError(
      ErrorCode.INVALID_CONFIG,
      `Unknown cancellation policy: ${String(cancellationPolicy)}`,
      undefined,
      { cancellationPolicy, allowed: CANCELLATION_POLICIES }
    );
  }

  const name = options.name ?? DEFAULT_LOCK_OPTIONS.name;
  const logger = options.logger
    ?? (name ? defaultLogger.createChild({ lockId: name }) : defaultLogger);

  return { name, logger, cancellationPolicy };
}
