import { test } from 'node:test';
import assert from 'node:assert/strict';
import { Endpoint } from '../src/endpoint.js';
import { MockServerError } from '../src/errors.js';
import type { Matcher } from '../src/matchers.js';
import { FailureCollector } from '../src/reporter.js';
import { statusCode } from '../src/responders.js';
import { FakeResponse, fakeRequest } from './helpers.js';

function serve(endpoint: Endpoint, reporter: FailureCollector): number {
  const res = new FakeResponse();
  endpoint.handle(fakeRequest({ path: endpoint.path, originalUrl: endpoint.path }), res, reporter);
  return res.statusCode;
}

test('plan repeats each scenario index by its times, in declaration order', () => {
  const endpoint = new Endpoint('GET', '/isbn');
  endpoint.addScenario().times(2);
  endpoint.addScenario();
  endpoint.addScenario().times(3);
  endpoint.freeze();

  assert.deepEqual(endpoint.responsePlan(), [0, 0, 1, 2, 2, 2]);
  assert.equal(endpoint.state(), 'serving');
});

test('serves scenarios in order and keeps the last one once the plan is used up', () => {
  const reporter = new FailureCollector();
  const endpoint = new Endpoint('GET', '/isbn');
  endpoint.addScenario().times(2).respond(statusCode(403));
  endpoint.addScenario().respond(statusCode(200));
  endpoint.freeze();

  const statuses = [1, 2, 3, 4].map(() => serve(endpoint, reporter));

  assert.deepEqual(statuses, [403, 403, 200, 200]);
  assert.equal(endpoint.timesCalled(), 4);
  const [first, second] = endpoint.scenarioList();
  assert.equal(first.timesCalled(), 2);
  assert.equal(second.timesCalled(), 2);
});

test('verify reports nothing when every scenario was called as expected', () => {
  const reporter = new FailureCollector();
  const endpoint = new Endpoint('GET', '/isbn');
  endpoint.addScenario().times(2).respond(statusCode(403));
  endpoint.addScenario().respond(statusCode(200));
  endpoint.freeze();

  serve(endpoint, reporter);
  serve(endpoint, reporter);
  serve(endpoint, reporter);

  assert.deepEqual(endpoint.verify(), []);
  assert.equal(endpoint.state(), 'verified');
});

test('verify reports one message per offending scenario', () => {
  const reporter = new FailureCollector();
  const endpoint = new Endpoint('GET', '/get');
  endpoint.addScenario().times(1);
  endpoint.addScenario().times(1);
  endpoint.freeze();

  assert.deepEqual(endpoint.verify(), [
    'expected endpoint was not called: GET /get [scenario 1/2]',
    'expected endpoint was not called: GET /get [scenario 2/2]'
  ]);

  const overCalled = new Endpoint('GET', '/get');
  overCalled.addScenario();
  overCalled.freeze();
  serve(overCalled, reporter);
  serve(overCalled, reporter);

  assert.deepEqual(overCalled.verify(), ['endpoint GET /get [scenario 1/1] was called 2 times, expected 1']);
});

test('runs matchers before responding and keeps responding when they fail', () => {
  const reporter = new FailureCollector();
  const order: string[] = [];
  const failing: Matcher = (r) => {
    order.push('first');
    r.error('first matcher failed');
  };
  const throwing: Matcher = () => {
    order.push('second');
    throw new Error('boom');
  };
  const endpoint = new Endpoint('POST', '/post');
  endpoint.addScenario([failing, throwing]).respond(statusCode(201));
  endpoint.freeze();

  const status = serve(endpoint, reporter);

  assert.equal(status, 201);
  assert.deepEqual(order, ['first', 'second']);
  assert.deepEqual(reporter.failures(), ['first matcher failed', 'matcher for POST /post threw: boom']);
});

test('a throwing responder is reported and answered with 500', () => {
  const reporter = new FailureCollector();
  const endpoint = new Endpoint('GET', '/broken');
  endpoint.addScenario().respond(() => {
    throw new Error('no fixture');
  });
  endpoint.freeze();

  assert.equal(serve(endpoint, reporter), 500);
  assert.deepEqual(reporter.failures(), ['responder for GET /broken threw: no fixture']);
});

test('values thrown that are not errors are reported as text', () => {
  const reporter = new FailureCollector();
  const endpoint = new Endpoint('GET', '/odd');
  endpoint
    .addScenario([
      () => {
        throw 'bad matcher';
      }
    ])
    .respond(() => {
      throw 42;
    });
  endpoint.freeze();

  assert.equal(serve(endpoint, reporter), 500);
  assert.deepEqual(reporter.failures(), [
    'matcher for GET /odd threw: bad matcher',
    'responder for GET /odd threw: 42'
  ]);
});

test('scenarios and endpoints are closed for changes once serving', () => {
  const endpoint = new Endpoint('GET', '/get');
  const scenario = endpoint.addScenario();
  endpoint.freeze();

  assert.throws(() => endpoint.addScenario(), (error: unknown) => {
    return error instanceof MockServerError && error.code === 'REGISTRATION_CLOSED';
  });
  assert.throws(() => scenario.times(2), (error: unknown) => {
    return error instanceof MockServerError && error.code === 'REGISTRATION_CLOSED';
  });
  assert.throws(() => scenario.respond(statusCode(200)), (error: unknown) => {
    return error instanceof MockServerError && error.code === 'REGISTRATION_CLOSED';
  });
});

test('times rejects values below one and fractions', () => {
  const endpoint = new Endpoint('GET', '/get');
  const scenario = endpoint.addScenario();

  for (const value of [0, -1, 1.5]) {
    assert.throws(() => scenario.times(value), (error: unknown) => {
      return error instanceof MockServerError && error.code === 'INVALID_TIMES';
    });
  }
  assert.equal(scenario.expectedTimes(), 1);
});

test('counts stay exact when requests are dispatched concurrently', async () => {
  const reporter = new FailureCollector();
  const endpoint = new Endpoint('GET', '/load');
  endpoint.addScenario().times(10).respond(statusCode(429));
  endpoint.addScenario().respond(statusCode(200));
  endpoint.freeze();

  const statuses = await Promise.all(
    Array.from({ length: 50 }, async () => {
      await new Promise((resolve) => setImmediate(resolve));
      return serve(endpoint, reporter);
    })
  );

  assert.equal(endpoint.timesCalled(), 50);
  const [limited, ok] = endpoint.scenarioList();
  assert.equal(limited.timesCalled(), 10);
  assert.equal(ok.timesCalled(), 40);
  assert.equal(statuses.filter((status) => status === 429).length, 10);
  assert.equal(statuses.filter((status) => status === 200).length, 40);
});
