/**
 * Shadow Critic
 *
 * Background auditor: after an agent's tool action completes, a configured
 * critic agent reviews it and raises an alert on major or critical issues.
 * Audits never block a turn.
 */

import {
  describeError,
  type AgentDirectory,
  type AgentProfile,
  type CredentialResolver,
  type ProviderCapability,
  type ProviderFactory,
} from '@crewroom/types';
import { silentLogger, type Logger } from '@crewroom/utils';
import { filterKeysFromText } from '@crewroom/providers';
import { hasUsableKey, resolveAgentApiKey } from '../security/api-keys.js';

export const DEFAULT_CRITIC_NAME = 'Critic';

const AUDIT_TEMPERATURE = 0.1;
const AUDIT_MAX_TOKENS = 500;
const MAX_EXCERPT_CHARS = 2000;
const ALERT_MARKER = 'STATUS: ALERT';

export interface AuditRequest {
  /** Agent that performed the action */
  agentName: string;
  action: string;
  result: string;
  /** Conversation context the action was taken in */
  context: string;
}

export interface CriticAlert {
  agentName: string;
  severity: string;
  issue: string;
  fix: string;
  /** Full critic reply */
  report: string;
}

export interface ShadowCriticOptions {
  directory: AgentDirectory;
  providerFactory: ProviderFactory;
  resolveCredential: CredentialResolver;
  criticName?: string;
  onAlert?: (alert: CriticAlert) => void;
  logger?: Logger;
}

export function buildAuditPrompt(request: AuditRequest): string {
  return [
    '[SHADOW AUDIT REQUEST]',
    `Agent '@${request.agentName}' just performed an action.`,
    `ACTION: ${request.action}`,
    `RESULT: ${request.result.slice(0, MAX_EXCERPT_CHARS)}`,
    '',
    'CONTEXT OF THE MISSION:',
    request.context.slice(0, MAX_EXCERPT_CHARS),
    '',
    'Your task:',
    '1. Review this action for security risks, bugs, or major architectural violations.',
    '2. If the action is SAFE and correct, respond with exactly: "STATUS: CLEAR"',
    '3. If you find a MAJOR or CRITICAL issue, respond with:',
    '   "STATUS: ALERT"',
    '   "SEVERITY: [Critical/Major]"',
    '   "ISSUE: [Brief description]"',
    '   "FIX: [Brief recommendation]"',
    '',
    'Be concise. Do not chat.',
  ].join('\n');
}

/**
 * Read SEVERITY/ISSUE/FIX lines from an alert reply; the last of each wins
 */
export function parseCriticAlert(agentName: string, report: string): CriticAlert {
  const alert: CriticAlert = {
    agentName,
    severity: 'MAJOR',
    issue: 'Unknown issue',
    fix: 'Check logs',
    report,
  };

  for (const line of report.split(/\r?\n/)) {
    const field = /(SEVERITY|ISSUE|FIX):(.*)$/.exec(line);
    const value = field?.[2]?.trim().replace(/^"|"$/g, '');
    if (!field || value === undefined) continue;

    if (field[1] === 'SEVERITY') alert.severity = value;
    else if (field[1] === 'ISSUE') alert.issue = value;
    else alert.fix = value;
  }
  return alert;
}

export class ShadowCritic {
  private directory: AgentDirectory;
  private providerFactory: ProviderFactory;
  private resolveCredential: CredentialResolver;
  private criticName: string;
  private onAlert?: (alert: CriticAlert) => void;
  private logger: Logger;
  private provider?: ProviderCapability;
  private providerKey = '';

  constructor(options: ShadowCriticOptions) {
    this.directory = options.directory;
    this.providerFactory = options.providerFactory;
    this.resolveCredential = options.resolveCredential;
    this.criticName = options.criticName ?? DEFAULT_CRITIC_NAME;
    this.onAlert = options.onAlert;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Audit one action. Resolves to the alert, or undefined when the action is
   * clear or the audit was skipped.
   */
  async audit(request: AuditRequest): Promise<CriticAlert | undefined> {
    if (request.agentName.toLowerCase() === this.criticName.toLowerCase()) {
      return undefined;
    }

    const criticName = this.directory.resolveName(this.criticName);
    if (criticName === undefined) {
      this.logger.debug(`No ${this.criticName} agent configured; skipping audit`);
      return undefined;
    }

    const profile = this.directory.getAgent(criticName);
    const apiKey = resolveAgentApiKey(profile, this.resolveCredential);
    if (!hasUsableKey(profile, apiKey)) {
      this.logger.debug(`No API key for ${criticName}; skipping audit`);
      return undefined;
    }

    const reply = await this.getProvider(profile, apiKey).complete([
      { role: 'user', content: buildAuditPrompt(request) },
    ]);

    if (!reply.content.includes(ALERT_MARKER)) {
      return undefined;
    }

    const alert = parseCriticAlert(request.agentName, reply.content);
    this.logger.warn(`Critic alert for ${request.agentName}: [${alert.severity}] ${alert.issue}`);
    this.onAlert?.(alert);
    return alert;
  }

  /**
   * Fire-and-forget audit. Failures are logged at debug level and dropped.
   */
  auditInBackground(request: AuditRequest): Promise<void> {
    return this.audit(request).then(
      () => undefined,
      (error: unknown) => {
        const message = filterKeysFromText(describeError(error), [this.providerKey]);
        this.logger.debug(`Background audit failed: ${message}`);
      }
    );
  }

  private getProvider(profile: AgentProfile, apiKey: string): ProviderCapability {
    if (!this.provider) {
      this.provider = this.providerFactory(
        profile.provider,
        {
          model: profile.model,
          temperature: AUDIT_TEMPERATURE,
          maxTokens: AUDIT_MAX_TOKENS,
          ...(profile.baseUrl ? { baseUrl: profile.baseUrl } : {}),
        },
        apiKey
      );
      this.providerKey = apiKey;
    }
    return this.provider;
  }
}
