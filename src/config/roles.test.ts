import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { RoleCatalog, createRole, PRIMARY_ROLE_ID } from './roles.js';

describe('createRole', () => {
  it('freezes the profile and converts the whitelist to a set', () => {
    const role = createRole({ id: 'r', systemInstructions: 'x', capabilityWhitelist: ['a', 'b'], maxReplyTokens: 10 });

    assert.ok(Object.isFrozen(role));
    assert.deepEqual(role.capabilityWhitelist, new Set(['a', 'b']));
    assert.equal(role.maxReplyTokens, 10);
  });

  it('treats a missing whitelist as unrestricted', () => {
    assert.equal(createRole({ id: 'r', systemInstructions: 'x' }).capabilityWhitelist, null);
  });

  it('rejects a role without instructions', () => {
    assert.throws(() => createRole({ id: 'r', systemInstructions: '  ' }), /requires id and systemInstructions/);
  });
});

describe('RoleCatalog', () => {
  let dir: string;

  before(() => {
    dir = mkdtempSync(join(tmpdir(), 'roles-test-'));
  });

  after(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('ships the primary role unrestricted and sub-agent roles restricted', () => {
    const catalog = new RoleCatalog();

    assert.deepEqual(catalog.ids(), ['assistant', 'researcher', 'coder', 'analyst', 'writer']);
    assert.equal(catalog.get(PRIMARY_ROLE_ID)?.capabilityWhitelist, null);
    assert.equal(catalog.get('researcher')?.capabilityWhitelist?.has('web_search'), true);
    assert.equal(catalog.get('researcher')?.capabilityWhitelist?.has('run_command'), false);
  });

  it('registers a runtime role, replacing one with the same id', () => {
    const catalog = new RoleCatalog([]);
    catalog.register({ id: 'poet', systemInstructions: 'rhyme' });
    catalog.register({ id: 'poet', systemInstructions: 'rhyme better' });

    assert.deepEqual(catalog.ids(), ['poet']);
    assert.equal(catalog.get('poet')?.systemInstructions, 'rhyme better');
  });

  it('loads custom roles and skips malformed entries', () => {
    const file = join(dir, 'roles.json');
    writeFileSync(file, JSON.stringify({
      roles: [
        { id: 'translator', displayName: 'Translator', systemInstructions: 'translate', capabilityWhitelist: ['translate_text'] },
        { id: 42, systemInstructions: 'bad id' },
        { id: 'empty', systemInstructions: '' },
      ],
    }));

    const catalog = new RoleCatalog([]);
    assert.equal(catalog.loadCustomRoles(file), 1);
    assert.deepEqual(catalog.ids(), ['translator']);
    assert.equal(catalog.get('translator')?.displayName, 'Translator');
  });

  it('ignores a missing or corrupted store', () => {
    const broken = join(dir, 'broken.json');
    writeFileSync(broken, '{not json');

    const catalog = new RoleCatalog([]);
    assert.equal(catalog.loadCustomRoles(join(dir, 'absent.json')), 0);
    assert.equal(catalog.loadCustomRoles(broken), 0);
    assert.deepEqual(catalog.ids(), []);
  });
});
