/**
 * Time-boxed trust grants ("flow state").
 *
 * A trusted agent's tool calls run without per-call confirmation until the
 * grant expires. Expired grants are purged lazily when observed.
 */
import { silentLogger, type Logger } from '@crewroom/utils'

export interface TrustGrant {
  agentName: string
  /** Epoch milliseconds */
  expiresAt: number
}

export interface TrustLedgerOptions {
  now?: () => number
  logger?: Logger
}

export class TrustLedger {
  private grants = new Map<string, number>()
  private now: () => number
  private logger: Logger

  constructor(options: TrustLedgerOptions = {}) {
    this.now = options.now ?? Date.now
    this.logger = options.logger ?? silentLogger
  }

  /**
   * Trust an agent for `durationSeconds`, replacing any earlier grant
   */
  grant(agentName: string, durationSeconds: number): TrustGrant {
    const expiresAt = this.now() + durationSeconds * 1000
    this.grants.set(agentName, expiresAt)
    this.logger.info(`Trusted ${agentName} for ${durationSeconds}s`)
    return { agentName, expiresAt }
  }

  revoke(agentName: string): void {
    if (this.grants.delete(agentName)) {
      this.logger.info(`Revoked trust for ${agentName}`)
    }
  }

  isTrusted(agentName: string): boolean {
    return this.activeExpiry(agentName) !== undefined
  }

  /**
   * Whole seconds left on the grant; 0 when untrusted
   */
  remainingSeconds(agentName: string): number {
    const expiresAt = this.activeExpiry(agentName)
    if (expiresAt === undefined) {
      return 0
    }
    return Math.max(0, Math.floor((expiresAt - this.now()) / 1000))
  }

  /**
   * Active grants, soonest expiry first
   */
  list(): TrustGrant[] {
    const active: TrustGrant[] = []
    for (const agentName of [...this.grants.keys()]) {
      const expiresAt = this.activeExpiry(agentName)
      if (expiresAt !== undefined) {
        active.push({ agentName, expiresAt })
      }
    }
    return active.sort((a, b) => a.expiresAt - b.expiresAt)
  }

  private activeExpiry(agentName: string): number | undefined {
    const expiresAt = this.grants.get(agentName)
    if (expiresAt === undefined) {
      return undefined
    }
    if (this.now() >= expiresAt) {
      this.grants.delete(agentName)
      this.logger.debug(`Trust for ${agentName} expired`)
      return undefined
    }
    return expiresAt
  }
}
