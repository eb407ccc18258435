import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, it, expect, afterEach } from 'vitest';
import { loadPolicyConfig } from '../../infra/config/loadPolicy';

describe('loadPolicyConfig', () => {
  const tempFiles: string[] = [];

  const writeTemp = (contents: string): string => {
    const file = path.join(os.tmpdir(), `policy-${process.pid}-${tempFiles.length}.json`);
    fs.writeFileSync(file, contents, 'utf-8');
    tempFiles.push(file);
    return file;
  };

  afterEach(() => {
    for (const file of tempFiles.splice(0)) {
      fs.rmSync(file, { force: true });
    }
  });

  it('loads the bundled policy', () => {
    const policy = loadPolicyConfig();

    expect(policy.messageLimit).toBe(4096);
    expect(policy.questionnaire.apartment).toEqual({ min: 1, max: 10000 });
    expect(policy.templates.user.ask_name).toBe('Ваше имя:');
  });

  it('reports a missing file', () => {
    expect(() => loadPolicyConfig('config/does-not-exist.json')).toThrow(/Failed to read configuration file/);
  });

  it('reports malformed JSON', () => {
    const file = writeTemp('{ not json');
    expect(() => loadPolicyConfig(file)).toThrow(/Failed to read configuration file/);
  });

  it('lists the fields that fail validation', () => {
    const file = writeTemp(JSON.stringify({ questionnaire: { apartment: { min: 5, max: 1 } }, templates: {} }));
    expect(() => loadPolicyConfig(file)).toThrow(/Invalid configuration in .*\n.*questionnaire/);
  });
});
