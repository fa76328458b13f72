import assert from 'node:assert/strict';
import { test } from 'node:test';
import { setTestEnv } from './testEnv';

setTestEnv();

test('classifies events, responses and unknown blocks', async () => {
  const { parseMessage } = await import('../src/ami/messageParser');

  const event = parseMessage(['Event: Newstate', 'Uniqueid: 1700000000.12']);
  const response = parseMessage(['Response: Success', 'ActionID: x-1', 'Ping: Pong']);
  const unknown = parseMessage(['Foo: bar']);

  assert.equal(event.kind, 'EVENT');
  assert.equal(event.eventName, 'Newstate');
  assert.equal(response.kind, 'RESPONSE');
  assert.equal(response.response, 'Success');
  assert.equal(response.actionId, 'x-1');
  assert.equal(response.eventName, undefined);
  assert.equal(unknown.kind, 'UNKNOWN');
});

test('looks fields up case-insensitively and keeps repeats in order', async () => {
  const { parseMessage } = await import('../src/ami/messageParser');
  const message = parseMessage([
    'Event: VarSet',
    'ChanVariable: FOO=1',
    'chanvariable: BAR=2',
    'X-Custom-Field:  spaced value  ',
  ]);

  assert.equal(message.get('CHANVARIABLE'), 'FOO=1');
  assert.deepEqual(message.getAll('ChanVariable'), ['FOO=1', 'BAR=2']);
  assert.equal(message.get('x-custom-field'), 'spaced value');
  assert.deepEqual(message.names(), ['Event', 'ChanVariable', 'X-Custom-Field']);
  assert.deepEqual(message.toRecord(), {
    Event: 'VarSet',
    ChanVariable: 'FOO=1',
    chanvariable: 'BAR=2',
    'X-Custom-Field': 'spaced value',
  });
});

test('splits only on the first colon', async () => {
  const { parseMessage } = await import('../src/ami/messageParser');
  const message = parseMessage(['Event: Newchannel', 'Channel: SIP/trunk:5060-00000001']);

  assert.equal(message.get('Channel'), 'SIP/trunk:5060-00000001');
});

test('appends colon-less lines to the previous value', async () => {
  const { parseMessage } = await import('../src/ami/messageParser');
  const message = parseMessage(['Response: Follows', 'Output: line one', 'line two', ':leading colon']);

  assert.equal(message.get('Output'), 'line one\nline two\n:leading colon');
  assert.equal(message.fields.length, 2);
});

test('keeps a leading orphan line under an empty name', async () => {
  const { parseMessage } = await import('../src/ami/messageParser');
  const message = parseMessage(['orphan text', 'Event: Ping']);

  assert.deepEqual(message.fields, [
    { name: '', value: 'orphan text' },
    { name: 'Event', value: 'Ping' },
  ]);
});

test('treats empty and <unknown> values as absent for getNonEmpty', async () => {
  const { parseMessage } = await import('../src/ami/messageParser');
  const message = parseMessage(['Event: Newchannel', 'CallerIDNum: <unknown>', 'CallerIDName:', 'Exten: 101']);

  assert.equal(message.getNonEmpty('CallerIDNum'), undefined);
  assert.equal(message.getNonEmpty('CallerIDName'), undefined);
  assert.equal(message.get('CallerIDName'), '');
  assert.equal(message.getNonEmpty('Exten'), '101');
  assert.equal(message.has('callerIDname'), true);
});

test('serializes actions with CRLF lines, repeated values and a blank terminator', async () => {
  const { serializeAction } = await import('../src/ami/messageParser');

  const payload = serializeAction({
    Action: 'Originate',
    Channel: 'PJSIP/101',
    Variable: ['A=1', 'B=2'],
    ActionID: 'x-7',
  });

  assert.equal(payload, 'Action: Originate\r\nChannel: PJSIP/101\r\nVariable: A=1\r\nVariable: B=2\r\nActionID: x-7\r\n\r\n');
});

test('replaces line breaks inside values so they cannot end the block', async () => {
  const { serializeAction } = await import('../src/ami/messageParser');

  const payload = serializeAction({ Action: 'Command', Command: 'core show\r\n\r\nchannels', ActionID: 'x-8' });

  assert.equal(payload, 'Action: Command\r\nCommand: core show channels\r\nActionID: x-8\r\n\r\n');
});
