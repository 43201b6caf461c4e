import { test } from 'vitest';
import assert from 'node:assert/strict';
import { existsSync } from 'node:fs';

import { classifyResourceChanges } from '../../src/domain/plan-classifier.js';
import { formatPlanAsHtml, resolveTemplateRoot } from '../../src/reporting/renderers/html.js';
import { resourceChange } from '../helpers/plan-fixtures.js';

const buckets = classifyResourceChanges([
  resourceChange({ actions: ['create'], after: { x: 'a' } }),
]);

test('formatPlanAsHtml renders tabs in category order with their captions', () => {
  const html = formatPlanAsHtml(buckets, { title: 'Plan review' });

  assert.ok(html.includes('<title>Plan review</title>'));
  const captions = [
    '<a href="#category-create" class="tone-green">CREATE (+ 1)</a>',
    '<a href="#category-destroy" class="tone-red is-empty">DESTROY (- 0)</a>',
    '<a href="#category-replace" class="tone-yellow is-empty">REPLACE (-/+ 0)</a>',
    '<a href="#category-update" class="tone-magenta is-empty">UPDATE (~ 0)</a>',
    '<a href="#category-other" class="tone-blue is-empty">IMPORT (0)</a>',
  ];
  const positions = captions.map((caption) => html.indexOf(caption));

  assert.ok(positions.every((position) => position >= 0));
  assert.deepEqual(
    [...positions].sort((left, right) => left - right),
    positions,
  );
});

test('formatPlanAsHtml renders each resource as an expandable diff block', () => {
  const html = formatPlanAsHtml(buckets);

  assert.ok(html.includes('<summary>t.n</summary>'));
  assert.ok(html.includes('<span class="tone-header"># t.n will be created</span>\n'));
  assert.ok(
    html.includes('<span class="tone-create">  + resource &quot;t&quot; &quot;n&quot; {</span>\n'),
  );
  assert.ok(html.includes('<span class="tone-create">      + x &#x3D; &quot;a&quot;</span>\n'));
  assert.ok(html.includes('<span class="tone-plain">    }</span>\n'));
});

test('formatPlanAsHtml marks empty categories', () => {
  const html = formatPlanAsHtml(buckets);

  assert.equal(html.split('<p class="empty">No changes in this category.</p>').length - 1, 4);
});

test('formatPlanAsHtml escapes the title and prints the generation time', () => {
  const html = formatPlanAsHtml(buckets, {
    title: 'Plan <staging>',
    generatedAt: new Date('2024-01-01T00:00:00Z'),
  });

  assert.ok(html.includes('<title>Plan &lt;staging&gt;</title>'));
  assert.ok(
    html.includes(
      'Plan: 1 to create, 0 to destroy, 0 to replace, 0 to update, 0 other. Generated 2024-01-01T00:00:00.000Z.',
    ),
  );
});

test('formatPlanAsHtml defaults the title', () => {
  assert.ok(formatPlanAsHtml(buckets).includes('<title>Terraform plan</title>'));
});

test('resolveTemplateRoot finds the shipped templates from the compiled tree', () => {
  const fromDist = resolveTemplateRoot('file:///opt/diff/dist/reporting/renderers/html.js');
  const fromSource = resolveTemplateRoot('file:///opt/diff/src/reporting/renderers/html.ts');

  assert.equal(fromDist.href, 'file:///opt/diff/src/reporting/templates/');
  assert.equal(fromSource.href, fromDist.href);
});

test('resolveTemplateRoot points at the templates beside the sources', () => {
  const root = resolveTemplateRoot(new URL('../../src/reporting/renderers/html.ts', import.meta.url));

  assert.ok(existsSync(new URL('plan-report.hbs', root)));
  assert.ok(existsSync(new URL('partials/resource-block.hbs', root)));
});
