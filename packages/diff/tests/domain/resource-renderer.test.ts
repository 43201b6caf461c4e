import { test } from 'vitest';
import assert from 'node:assert/strict';

import {
  describeOutcome,
  renderResourceChange,
  renderResourceText,
  resolveAction,
} from '../../src/domain/resource-renderer.js';
import { resourceChange } from '../helpers/plan-fixtures.js';

test('renderResourceChange renders a created resource', () => {
  const rendered = renderResourceChange(
    resourceChange({ actions: ['create'], after: { x: 'a' } }),
  );

  assert.equal(rendered.category, 'create');
  assert.equal(rendered.action, 'create');
  assert.deepEqual(rendered.lines, [
    { text: '# t.n will be created', tone: 'header' },
    { text: '  + resource "t" "n" {', tone: 'create' },
    { text: '      + x = "a"', tone: 'create' },
    { text: '    }', tone: 'plain' },
  ]);
});

test('renderResourceChange renders a replaced resource', () => {
  const rendered = renderResourceChange(
    resourceChange({ actions: ['delete', 'create'], before: { x: 'a' }, after: { x: 'b' } }),
  );

  assert.equal(rendered.category, 'replace');
  assert.deepEqual(rendered.lines, [
    { text: '# t.n must be replaced', tone: 'header' },
    { text: '  -/+ resource "t" "n" {', tone: 'replace' },
    { text: '      ~ x = "a" -> "b"', tone: 'replace' },
    { text: '    }', tone: 'plain' },
  ]);
});

test('renderResourceChange skips id and merges keys from every map in order', () => {
  const rendered = renderResourceChange(
    resourceChange({
      type: 'aws_instance',
      name: 'web',
      actions: ['update'],
      before: { id: 'i-123', tags: { env: 'dev' }, ami: 'ami-1' },
      after: { id: 'i-123', tags: { env: 'prod' }, ami: 'ami-1' },
      afterUnknown: { public_ip: true, id: false },
    }),
  );

  assert.deepEqual(
    rendered.lines.map((line) => line.text),
    [
      '# aws_instance.web will be updated in-place',
      '  ~ resource "aws_instance" "web" {',
      '      + public_ip = (known after apply)',
      '      ~ tags = {',
      '          ~ env = "dev" -> "prod"',
      '      }',
      '    }',
    ],
  );
  assert.equal(rendered.lines[4]?.tone, 'update');
});

test('renderResourceChange renders destroyed and other resources', () => {
  const destroyed = renderResourceChange(
    resourceChange({ actions: ['delete'], before: { size: 2 } }),
  );
  assert.deepEqual(
    destroyed.lines.map((line) => line.text),
    ['# t.n will be destroyed', '  - resource "t" "n" {', '      - size = 2', '    }'],
  );

  const read = renderResourceChange(resourceChange({ actions: ['read'], after: { id: 'x' } }));
  assert.equal(read.category, 'other');
  assert.deepEqual(
    read.lines.map((line) => line.text),
    ['# t.n will be read', '   resource "t" "n" {', '    }'],
  );
});

test('renderResourceChange output does not depend on previous calls', () => {
  const change = resourceChange({
    actions: ['update'],
    before: { a: 1, b: { c: [1, 2] } },
    after: { a: 2, b: { c: [1, 3] } },
  });

  assert.deepEqual(renderResourceChange(change), renderResourceChange(change));
  assert.deepEqual(renderResourceText(change), renderResourceText(change));
});

test('renderResourceText splits multi-line values into physical lines', () => {
  const text = renderResourceText(
    resourceChange({ actions: ['create'], after: { ports: [80, 443] } }),
  );

  assert.deepEqual(text, [
    '# t.n will be created',
    '  + resource "t" "n" {',
    '      + ports = [',
    '          80,',
    '          443,',
    '      ]',
    '    }',
  ]);
});

test('resolveAction prefers replace for delete-then-create', () => {
  assert.equal(resolveAction(['delete', 'create']), 'replace');
  assert.equal(resolveAction(['create', 'delete']), 'create');
  assert.equal(resolveAction(['import']), 'import');
  assert.equal(resolveAction([]), 'no-op');
});

test('describeOutcome phrases each action', () => {
  assert.equal(describeOutcome('create'), 'will be created');
  assert.equal(describeOutcome('delete'), 'will be destroyed');
  assert.equal(describeOutcome('update'), 'will be updated in-place');
  assert.equal(describeOutcome('replace'), 'must be replaced');
  assert.equal(describeOutcome('read'), 'will be read');
  assert.equal(describeOutcome('no-op'), 'will be left unchanged');
  assert.equal(describeOutcome('import'), 'will be imported');
});
