import assert from 'node:assert/strict';
import { test } from 'node:test';
import { setTestEnv } from './testEnv';

setTestEnv();

async function createCorrelator(defaultTimeoutMs = 1000) {
  const { ActionCorrelator } = await import('../src/ami/actionCorrelator');
  const { parseMessage } = await import('../src/ami/messageParser');
  const sent: string[] = [];
  const correlator = new ActionCorrelator({
    defaultTimeoutMs,
    idPrefix: 'test',
    send: (payload) => {
      sent.push(payload);
    },
  });
  const respond = (lines: string[]): boolean => correlator.handleResponse(parseMessage(lines));
  const event = (lines: string[]): boolean => correlator.handleEvent(parseMessage(lines));
  return { correlator, sent, respond, event };
}

test('writes the action with a generated ActionID', async () => {
  const { correlator, sent, respond } = await createCorrelator();

  const pending = correlator.submit({ Action: 'Ping' });
  assert.deepEqual(sent, ['Action: Ping\r\nActionID: test-1\r\n\r\n']);
  assert.equal(correlator.has('test-1'), true);

  assert.equal(respond(['Response: Success', 'ActionID: test-1', 'Ping: Pong']), true);
  const response = await pending;
  assert.equal(response.get('Ping'), 'Pong');
  assert.equal(correlator.pendingCount, 0);
});

test('caller fields cannot override the generated ActionID', async () => {
  const { correlator, sent, respond } = await createCorrelator();

  const pending = correlator.submit({ Action: 'Ping', ActionID: 'mine' });
  assert.deepEqual(sent, ['Action: Ping\r\nActionID: test-1\r\n\r\n']);

  respond(['Response: Success', 'ActionID: test-1']);
  await pending;
});

test('resolves concurrent actions by ActionID regardless of response order', async () => {
  const { correlator, respond } = await createCorrelator();

  const first = correlator.submit({ Action: 'Ping' });
  const second = correlator.submit({ Action: 'Hangup', Channel: 'PJSIP/101-00000001' });

  respond(['Response: Success', 'ActionID: test-2', 'Message: Channel Hungup']);
  respond(['Response: Success', 'ActionID: test-1', 'Ping: Pong']);

  const [pong, hungup] = await Promise.all([first, second]);
  assert.equal(pong.get('Ping'), 'Pong');
  assert.equal(hungup.get('Message'), 'Channel Hungup');
});

test('ignores responses with unknown or missing ActionIDs', async () => {
  const { correlator, respond } = await createCorrelator();

  const pending = correlator.submit({ Action: 'Ping' });
  assert.equal(respond(['Response: Success', 'ActionID: other-9']), false);
  assert.equal(respond(['Response: Success']), false);
  assert.equal(correlator.pendingCount, 1);

  respond(['Response: Success', 'ActionID: test-1']);
  await pending;
});

test('rejects with ActionRejectedError carrying the server message', async () => {
  const { ActionRejectedError } = await import('../src/errors');
  const { correlator, respond } = await createCorrelator();

  const pending = correlator.submit({ Action: 'Hangup', Channel: 'PJSIP/999-00000001' });
  respond(['Response: Error', 'ActionID: test-1', 'Message: No such channel']);

  await assert.rejects(pending, (error: unknown) => {
    assert.ok(error instanceof ActionRejectedError);
    assert.equal(error.action, 'Hangup');
    assert.equal(error.actionId, 'test-1');
    assert.equal(error.serverMessage, 'No such channel');
    return true;
  });
  assert.equal(correlator.pendingCount, 0);
});

test('times out and forgets the pending entry', async () => {
  const { ActionTimeoutError } = await import('../src/errors');
  const { correlator, respond } = await createCorrelator();

  const pending = correlator.submit({ Action: 'Ping' }, { timeoutMs: 20 });

  await assert.rejects(pending, (error: unknown) => {
    assert.ok(error instanceof ActionTimeoutError);
    assert.equal(error.timeoutMs, 20);
    assert.equal(error.message, "action 'Ping' (id=test-1) timed out after 20ms");
    return true;
  });
  assert.equal(correlator.has('test-1'), false);
  assert.equal(correlator.pendingCount, 0);
  assert.equal(respond(['Response: Success', 'ActionID: test-1']), false);
});

test('failAll rejects every pending action with the given reason', async () => {
  const { DisconnectedError } = await import('../src/errors');
  const { correlator } = await createCorrelator();

  const first = correlator.submit({ Action: 'Ping' });
  const second = correlator.submit({ Action: 'Ping' });
  const reason = new DisconnectedError('socket closed');

  assert.equal(correlator.failAll(reason), 2);
  await Promise.all([
    assert.rejects(first, (error: unknown) => error === reason),
    assert.rejects(second, (error: unknown) => error === reason),
  ]);
  assert.equal(correlator.pendingCount, 0);
});

test('rejects immediately when the action cannot be written', async () => {
  const { ActionCorrelator } = await import('../src/ami/actionCorrelator');
  const { DisconnectedError } = await import('../src/errors');
  const correlator = new ActionCorrelator({
    defaultTimeoutMs: 1000,
    send: () => {
      throw new DisconnectedError('ami socket not writable');
    },
  });

  await assert.rejects(correlator.submit({ Action: 'Ping' }), DisconnectedError);
  assert.equal(correlator.pendingCount, 0);
});

test('collects list events until EventList Complete', async () => {
  const { correlator, respond, event } = await createCorrelator();

  const pending = correlator.submitList({ Action: 'PJSIPShowEndpoints' });
  respond(['Response: Success', 'ActionID: test-1', 'EventList: start', 'Message: A listing of Endpoints follows']);
  assert.equal(event(['Event: EndpointList', 'ActionID: test-1', 'ObjectName: 101']), true);
  assert.equal(event(['Event: EndpointList', 'ActionID: test-1', 'ObjectName: 102']), true);
  assert.equal(event(['Event: Newstate', 'Uniqueid: 1']), false);
  assert.equal(correlator.pendingCount, 1);
  event(['Event: EndpointListComplete', 'ActionID: test-1', 'EventList: Complete', 'ListItems: 2']);

  const result = await pending;
  assert.equal(result.response.get('EventList'), 'start');
  assert.deepEqual(
    result.events.map((item) => item.get('ObjectName')),
    ['101', '102'],
  );
  assert.equal(correlator.pendingCount, 0);
});

test('list actions still fail on an error response', async () => {
  const { ActionRejectedError } = await import('../src/errors');
  const { correlator, respond } = await createCorrelator();

  const pending = correlator.submitList({ Action: 'PJSIPShowEndpoints' });
  respond(['Response: Error', 'ActionID: test-1', 'Message: Permission denied']);

  await assert.rejects(pending, ActionRejectedError);
});
