import { describe, it, expect, vi } from 'vitest';
import type { CredentialResolver } from '@crewroom/types';
import type { Logger } from '@crewroom/utils';
import {
  ShadowCritic,
  buildAuditPrompt,
  parseCriticAlert,
  type AuditRequest,
  type CriticAlert,
} from './shadow-critic.js';
import { AgentRegistry } from '@crewroom/config';
import { FakeProvider, agent, createTeamDirectory } from '../testing/fakes.js';

const request: AuditRequest = {
  agentName: 'Coder',
  action: 'shell: rm -rf build',
  result: 'Command executed successfully (no output).',
  context: 'Clean the build output',
};

function setup(replies: Array<string | Error>, resolver: CredentialResolver = () => 'test-key') {
  const provider = new FakeProvider('openai', replies);
  const factory = vi.fn(() => provider);
  const alerts: CriticAlert[] = [];
  const critic = new ShadowCritic({
    directory: createTeamDirectory(),
    providerFactory: factory,
    resolveCredential: resolver,
    onAlert: (alert) => alerts.push(alert),
  });
  return { critic, provider, factory, alerts };
}

describe('buildAuditPrompt', () => {
  it('names the agent and truncates long results and context', () => {
    const prompt = buildAuditPrompt({ ...request, result: 'r'.repeat(2500), context: 'c'.repeat(2500) });
    const lines = prompt.split('\n');

    expect(lines[1]).toBe("Agent '@Coder' just performed an action.");
    expect(lines[2]).toBe('ACTION: shell: rm -rf build');
    expect(lines[3]).toBe(`RESULT: ${'r'.repeat(2000)}`);
    expect(lines[6]).toBe('c'.repeat(2000));
  });
});

describe('parseCriticAlert', () => {
  it('reads severity, issue and fix', () => {
    const alert = parseCriticAlert(
      'Coder',
      'STATUS: ALERT\nSEVERITY: Critical\nISSUE: Deletes the repo\nFIX: Scope the path'
    );

    expect(alert).toMatchObject({
      agentName: 'Coder',
      severity: 'Critical',
      issue: 'Deletes the repo',
      fix: 'Scope the path',
    });
  });

  it('strips quotes and falls back to defaults', () => {
    const alert = parseCriticAlert('Coder', '"STATUS: ALERT"\n"ISSUE: Missing tests"');

    expect(alert.severity).toBe('MAJOR');
    expect(alert.issue).toBe('Missing tests');
    expect(alert.fix).toBe('Check logs');
  });
});

describe('ShadowCritic', () => {
  it('raises alerts reported by the critic', async () => {
    const { critic, alerts } = setup(['STATUS: ALERT\nSEVERITY: Major\nISSUE: Unsafe\nFIX: Revert']);

    const alert = await critic.audit(request);

    expect(alert?.issue).toBe('Unsafe');
    expect(alerts).toHaveLength(1);
    expect(alerts[0]?.severity).toBe('Major');
  });

  it('stays quiet for clear actions', async () => {
    const { critic, alerts } = setup(['STATUS: CLEAR']);

    await expect(critic.audit(request)).resolves.toBeUndefined();
    expect(alerts).toHaveLength(0);
  });

  it('calls the critic deterministically with a short reply budget', async () => {
    const { critic, provider, factory } = setup(['STATUS: CLEAR']);

    await critic.audit(request);

    expect(factory).toHaveBeenCalledWith(
      'openai',
      { model: 'gpt-4o', temperature: 0.1, maxTokens: 500 },
      'test-key'
    );
    expect(provider.completeCalls[0]?.messages).toEqual([
      { role: 'user', content: buildAuditPrompt(request) },
    ]);
  });

  it('does not audit the critic itself', async () => {
    const { critic, factory } = setup(['STATUS: ALERT']);

    await expect(critic.audit({ ...request, agentName: 'Critic' })).resolves.toBeUndefined();
    expect(factory).not.toHaveBeenCalled();
  });

  it('skips when no critic agent is configured', async () => {
    const factory = vi.fn(() => new FakeProvider('openai', ['STATUS: ALERT']));
    const critic = new ShadowCritic({
      directory: new AgentRegistry({ Coder: agent() }, 'Coder'),
      providerFactory: factory,
      resolveCredential: () => 'test-key',
    });

    await expect(critic.audit(request)).resolves.toBeUndefined();
    expect(factory).not.toHaveBeenCalled();
  });

  it('skips when no key resolves', async () => {
    const { critic, factory } = setup(['STATUS: ALERT'], () => '');

    await expect(critic.audit(request)).resolves.toBeUndefined();
    expect(factory).not.toHaveBeenCalled();
  });

  it('swallows background failures and logs them at debug level', async () => {
    const debug = vi.fn();
    const logger: Logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug };
    const critic = new ShadowCritic({
      directory: createTeamDirectory(),
      providerFactory: () => new FakeProvider('openai', [new Error('network down')]),
      resolveCredential: () => 'test-key',
      logger,
    });

    await expect(critic.auditInBackground(request)).resolves.toBeUndefined();
    expect(debug).toHaveBeenCalledWith('Background audit failed: network down');
  });

  it('redacts the critic key in logged failures', async () => {
    const debug = vi.fn();
    const logger: Logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug };
    const critic = new ShadowCritic({
      directory: createTeamDirectory(),
      providerFactory: () => new FakeProvider('openai', [new Error('key test-key was rejected')]),
      resolveCredential: () => 'test-key',
      logger,
    });

    await critic.auditInBackground(request);

    expect(debug).toHaveBeenCalledWith('Background audit failed: key *** was rejected');
  });
});
