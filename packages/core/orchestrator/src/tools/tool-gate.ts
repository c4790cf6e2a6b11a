/**
 * Tool Gate
 *
 * Decides whether a proposed tool call runs straight away (trusted agent)
 * or needs the human's consent first, fills the tool's primary argument from
 * the tag body, and runs it. Executor failures come back as text.
 */

import {
  describeError,
  type ConfirmationHandler,
  type GateDecision,
  type ParsedToolCall,
  type ToolArgs,
  type ToolOutcome,
  type ToolRegistration,
} from '@crewroom/types';
import { silentLogger, type Logger } from '@crewroom/utils';
import type { TrustLedger } from '../security/trust-ledger.js';
import type { ToolRegistry } from './tool-registry.js';
import { createDiffPreview } from './diff-preview.js';

export interface ToolGateOptions {
  registry: ToolRegistry;
  trust: TrustLedger;
  logger?: Logger;
}

function unknownToolMessage(name: string): string {
  return `Error: Tool '${name}' not found.`;
}

export class ToolGate {
  private registry: ToolRegistry;
  private trust: TrustLedger;
  private logger: Logger;

  constructor(options: ToolGateOptions) {
    this.registry = options.registry;
    this.trust = options.trust;
    this.logger = options.logger ?? silentLogger;
  }

  decide(agentName: string, toolName: string): GateDecision {
    const trusted = this.trust.isTrusted(agentName);
    const needsPreview = this.registry.get(toolName)?.requiresDiffPreview === true;

    return {
      autoExecute: trusted,
      requiresConfirmation: !trusted,
      requiresDiffPreview: !trusted && needsPreview,
    };
  }

  /**
   * Call arguments with the body filling the tool's primary argument when absent
   */
  resolveArgs(call: ParsedToolCall): ToolArgs {
    const args: ToolArgs = { ...call.args };
    const registration = this.registry.get(call.name);
    const primaryArg = registration?.primaryArg;
    const body = registration?.preserveBody ? call.body : call.body.trim();

    if (primaryArg !== undefined && args[primaryArg] === undefined && body !== '') {
      args[primaryArg] = body;
    }
    return args;
  }

  async execute(call: ParsedToolCall): Promise<string> {
    const registration = this.registry.get(call.name);
    if (!registration) {
      return unknownToolMessage(call.name);
    }

    try {
      return await registration.executor.execute(this.resolveArgs(call));
    } catch (error) {
      this.logger.warn(`Tool ${call.name} failed: ${describeError(error)}`);
      return `Error executing ${call.name}: ${describeError(error)}`;
    }
  }

  /**
   * Gate, confirm if needed, and run one call on behalf of an agent
   */
  async process(
    agentName: string,
    call: ParsedToolCall,
    confirm: ConfirmationHandler
  ): Promise<ToolOutcome> {
    const registration = this.registry.get(call.name);
    if (!registration) {
      return { call, status: 'unknown_tool', autoExecuted: false, output: unknownToolMessage(call.name) };
    }

    const decision = this.decide(agentName, call.name);
    if (decision.autoExecute) {
      this.logger.info(`Auto-executing ${call.name} for trusted agent ${agentName}`);
      return { call, status: 'executed', autoExecuted: true, output: await this.execute(call) };
    }

    const args = this.resolveArgs(call);
    const diff = decision.requiresDiffPreview
      ? await this.buildPreview(registration, args)
      : undefined;

    const approved = await confirm({
      agentName,
      call,
      args,
      ...(diff !== undefined ? { diff } : {}),
    });
    if (!approved) {
      this.logger.info(`${call.name} declined for ${agentName}`);
      return {
        call,
        status: 'declined',
        autoExecuted: false,
        output: `User declined to run ${call.name}.`,
      };
    }

    return { call, status: 'executed', autoExecuted: false, output: await this.execute(call) };
  }

  private async buildPreview(registration: ToolRegistration, args: ToolArgs): Promise<string> {
    const proposed = args.content ?? '';
    let current = '';
    let displayPath = args.path ?? registration.name;

    if (registration.readCurrent) {
      try {
        const snapshot = await registration.readCurrent(args);
        current = snapshot.content;
        displayPath = args.path ?? snapshot.path;
      } catch (error) {
        this.logger.warn(`Could not read current content for preview: ${describeError(error)}`);
      }
    }

    return createDiffPreview(displayPath, current, proposed);
  }
}
