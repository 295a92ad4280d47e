import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { InvalidArgumentError } from 'commander';

import { buildSettingsPatch, displaySettings } from '@/commands/config.js';
import {
  asArgParser,
  parseJsonObject,
  parsePort,
  parseTimeoutMs,
  parseTimeoutSeconds,
} from '@/commands/shared/commonOptions.js';
import { settingsFromRecord } from '@/settings/settings.js';
import { CommandError } from '@/ui/errors/index.js';

function isInvalidArguments(message: string) {
  return (error: unknown): boolean =>
    error instanceof CommandError && error.exitCode === 81 && error.message === message;
}

void describe('option parsers', () => {
  void it('parses ports in range', () => {
    assert.equal(parsePort('4455'), 4455);
    assert.equal(parsePort('1'), 1);
    assert.equal(parsePort('65535'), 65535);
  });

  void it('rejects ports out of range or not integers', () => {
    assert.throws(() => parsePort('0'), isInvalidArguments('Invalid port: 0'));
    assert.throws(() => parsePort('65536'), isInvalidArguments('Invalid port: 65536'));
    assert.throws(() => parsePort('44.5'), isInvalidArguments('Invalid port: 44.5'));
    assert.throws(() => parsePort('obs'), isInvalidArguments('Invalid port: obs'));
  });

  void it('parses positive timeouts', () => {
    assert.equal(parseTimeoutMs('250'), 250);
    assert.equal(parseTimeoutSeconds('2.5'), 2.5);
    assert.throws(() => parseTimeoutMs('0'), isInvalidArguments('Invalid timeout: 0'));
    assert.throws(() => parseTimeoutMs('-5'), isInvalidArguments('Invalid timeout: -5'));
    assert.throws(
      () => parseTimeoutSeconds('soon'),
      isInvalidArguments('Invalid request timeout: soon')
    );
  });

  void it('parses JSON objects', () => {
    assert.deepEqual(parseJsonObject('{"count":3,"nested":{"ok":true}}'), {
      count: 3,
      nested: { ok: true },
    });
  });

  void it('rejects JSON that is not an object', () => {
    assert.throws(() => parseJsonObject('[1,2]'), isInvalidArguments('Expected a JSON object'));
    assert.throws(() => parseJsonObject('"text"'), isInvalidArguments('Expected a JSON object'));
    assert.throws(
      () => parseJsonObject('{oops'),
      (error: unknown) => error instanceof CommandError && error.message.startsWith('Invalid JSON: ')
    );
  });

  void it('reports parser failures to commander as invalid arguments', () => {
    const parse = asArgParser(parsePort);
    assert.equal(parse('4460'), 4460);
    assert.throws(
      () => parse('99999'),
      (error: unknown) => error instanceof InvalidArgumentError && error.message === 'Invalid port: 99999'
    );
  });
});

void describe('config set flags', () => {
  void it('maps flags to snake_case settings', () => {
    assert.deepEqual(
      buildSettingsPatch({
        host: 'obs.local',
        port: 4460,
        password: '',
        ssl: false,
        namespace: 'deck',
        requestTimeout: 2,
        json: true,
      }),
      {
        host: 'obs.local',
        port: 4460,
        password: '',
        use_ssl: false,
        namespace: 'deck',
        request_timeout: 2,
      }
    );
  });

  void it('requires at least one setting', () => {
    assert.throws(() => buildSettingsPatch({ json: false }), isInvalidArguments('No settings given'));
  });

  void it('masks the password for display', () => {
    assert.equal(displaySettings(settingsFromRecord({ password: 'test-secret' }))['password'], '********');
    assert.equal(displaySettings(settingsFromRecord({}))['password'], '');
  });
});
