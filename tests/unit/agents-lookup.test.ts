/**
 * Unit Tests: Agent Lookup
 *
 * Tests naming, user alias matching and state classification.
 */

import { describe, it, expect } from 'vitest';
import {
  aclNameFor,
  classifyAgent,
  expandUserAliases,
  findExistingAgent,
  matchesAgentUser,
  missingComponents,
  presentComponents,
  roleNameFor,
} from '../../src/reconcilers/agents/lookup.js';
import { FakeCluster, createMemoryLogger } from '../helpers/fake-cluster.js';

describe('naming', () => {
  it('derives ACL and role names from the agent name', () => {
    expect(aclNameFor('radar-agent')).toBe('radar-agent-acl');
    expect(roleNameFor('radar-agent')).toBe('radar-agent-role');
  });

  it('expands every occurrence of the placeholder', () => {
    expect(expandUserAliases('radar', ['{agent}', '{agent}+{agent}@corp.test'])).toEqual([
      'radar',
      'radar+radar@corp.test',
    ]);
  });
});

describe('matchesAgentUser', () => {
  const user = { uid: 1, name: 'Radar Bot', email: 'radar@re.demo', role_uids: [] };

  it('matches on email when the name differs', () => {
    expect(matchesAgentUser(user, 'radar')).toBe(true);
  });

  it('does not match another agent', () => {
    expect(matchesAgentUser(user, 'radar-agent')).toBe(false);
  });

  it('uses custom templates when given', () => {
    expect(matchesAgentUser(user, 'radar', ['{agent}@corp.test'])).toBe(false);
  });
});

describe('findExistingAgent', () => {
  it('finds all three components', async () => {
    const cluster = new FakeCluster();
    const acl = cluster.seedAcl('radar-agent-acl');
    const role = cluster.seedRole('radar-agent-role');
    const user = cluster.seedUser('radar-agent', 'radar-agent@example.com', [role.uid]);
    cluster.seedAcl('other-acl');

    const found = await findExistingAgent(cluster, 'radar-agent');

    expect(found).toEqual({ acl, role, user });
    expect(classifyAgent(found)).toBe('COMPLETE');
  });

  it('treats a failing listing as not found', async () => {
    const cluster = new FakeCluster();
    cluster.seedAcl('radar-agent-acl');
    cluster.seedRole('radar-agent-role');
    cluster.failingLists.add('role');
    const { logger, lines } = createMemoryLogger('debug');

    const found = await findExistingAgent(cluster, 'radar-agent', { logger });

    expect(Object.keys(found)).toEqual(['acl']);
    expect(lines).toEqual([
      '[DEBUG] Lookup of role failed; treating as not found {"error":"GET /roles failed with status 503"}',
    ]);
  });
});

describe('classification', () => {
  it('orders present and missing kinds by creation order', () => {
    const components = { user: { uid: 1, name: 'a', email: 'a@x', role_uids: [] } };

    expect(presentComponents(components)).toEqual(['user']);
    expect(missingComponents(components)).toEqual(['acl', 'role']);
    expect(classifyAgent(components)).toBe('PARTIAL');
    expect(classifyAgent({})).toBe('ABSENT');
  });
});
