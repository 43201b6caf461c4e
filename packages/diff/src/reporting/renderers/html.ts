import { readFileSync } from 'node:fs';

import Handlebars from 'handlebars';

import {
  CATEGORY_ORDER,
  describeCategory,
  formatCategoryCaption,
  type Category,
  type CategoryTone,
} from '../../domain/categories.js';
import type { LineTone } from '../../domain/diff-engine.js';
import { summarizeBuckets, type PlanBuckets } from '../../domain/plan-classifier.js';
import { renderResourceChange } from '../../domain/resource-renderer.js';
import { formatPlanSummary } from './cli.js';

export interface HtmlFormatterOptions {
  readonly title?: string;
  readonly generatedAt?: Date;
}

interface HtmlTabModel {
  readonly href: string;
  readonly caption: string;
  readonly tone: CategoryTone;
  readonly isEmpty: boolean;
}

interface HtmlLineModel {
  readonly text: string;
  readonly tone: LineTone;
}

interface HtmlResourceModel {
  readonly address: string;
  readonly lines: readonly HtmlLineModel[];
}

interface HtmlSectionModel {
  readonly id: string;
  readonly caption: string;
  readonly tone: CategoryTone;
  readonly isEmpty: boolean;
  readonly resources: readonly HtmlResourceModel[];
}

interface HtmlTemplateContext {
  readonly title: string;
  readonly styles: string;
  readonly summary: string;
  readonly hasGeneratedAt: boolean;
  readonly generatedAt: string;
  readonly tabs: readonly HtmlTabModel[];
  readonly sections: readonly HtmlSectionModel[];
}

const DEFAULT_TITLE = 'Terraform plan';

const HTML_STYLES = `
:root { color-scheme: dark; }
body { margin: 0; padding: 24px; background: #1c1c1c; color: #e4e4e4; font-family: ui-monospace, SFMono-Regular, Menlo, Consolas, monospace; }
header h1 { margin: 0 0 4px; font-size: 1.4rem; }
header p { margin: 0 0 16px; color: #8a8a8a; }
nav.tabs { display: flex; flex-wrap: wrap; gap: 8px; padding-bottom: 12px; border-bottom: 1px solid #626262; }
nav.tabs a { padding: 4px 12px; border-radius: 4px; text-decoration: none; font-weight: bold; border: 1px solid currentColor; }
nav.tabs a.is-empty { opacity: 0.5; }
section.category { margin-top: 24px; }
section.category h2 { font-size: 1.1rem; margin: 0 0 8px; }
p.empty { color: #8a8a8a; padding-left: 2ch; }
details.resource { margin: 4px 0; }
details.resource summary { cursor: pointer; padding: 2px 0; }
pre.diff { margin: 8px 0 8px 2ch; padding: 12px; background: #121212; border-radius: 4px; overflow-x: auto; }
.tone-green, .tone-create { color: #00af00; }
.tone-red, .tone-destroy { color: #d70000; }
.tone-yellow, .tone-replace { color: #ffaf00; }
.tone-magenta, .tone-update { color: #ae00ff; }
.tone-blue, .tone-other { color: #00afff; }
.tone-header { font-weight: bold; }
`;

/**
 * Locates the Handlebars templates from this module's URL. The package ships them
 * under `src/reporting/templates`, which sits at the same depth from the package
 * root whether the module runs from `src` or from the compiled `dist` tree.
 */
export function resolveTemplateRoot(moduleUrl: string | URL): URL {
  return new URL('../../../src/reporting/templates/', moduleUrl);
}

const TEMPLATE_ROOT = resolveTemplateRoot(import.meta.url);

let cachedTemplate: Handlebars.TemplateDelegate<HtmlTemplateContext> | undefined;

function getHtmlTemplate(): Handlebars.TemplateDelegate<HtmlTemplateContext> {
  cachedTemplate ??= compileHtmlTemplate();
  return cachedTemplate;
}

function compileHtmlTemplate(): Handlebars.TemplateDelegate<HtmlTemplateContext> {
  const environment = Handlebars.create();
  environment.registerPartial('category-section', readTemplateAsset('partials/category-section.hbs'));
  environment.registerPartial('resource-block', readTemplateAsset('partials/resource-block.hbs'));

  return environment.compile<HtmlTemplateContext>(readTemplateAsset('plan-report.hbs'), {
    strict: true,
  });
}

function readTemplateAsset(relativePath: string): string {
  return readFileSync(new URL(relativePath, TEMPLATE_ROOT), 'utf8');
}

/**
 * Renders classified resources as a self-contained HTML document. Categories appear
 * in the same order, with the same captions, as in the terminal explorer, and each
 * resource expands to its diff block.
 *
 * @param buckets - Classified resource changes.
 * @param options - Document title and generation timestamp.
 * @returns The HTML document.
 */
export function formatPlanAsHtml(buckets: PlanBuckets, options: HtmlFormatterOptions = {}): string {
  const tabs: HtmlTabModel[] = [];
  const sections: HtmlSectionModel[] = [];

  for (const category of CATEGORY_ORDER) {
    const resources = buckets[category];
    const caption = formatCategoryCaption(category, resources.length);
    const { tone } = describeCategory(category);

    tabs.push({ href: `#${sectionId(category)}`, caption, tone, isEmpty: resources.length === 0 });
    sections.push({
      id: sectionId(category),
      caption,
      tone,
      isEmpty: resources.length === 0,
      resources: resources.map((resource) => {
        const rendered = renderResourceChange(resource);
        return {
          address: rendered.address,
          lines: rendered.lines.flatMap((line) =>
            line.text.split('\n').map((text) => ({ text, tone: line.tone })),
          ),
        };
      }),
    });
  }

  return getHtmlTemplate()({
    title: options.title ?? DEFAULT_TITLE,
    styles: HTML_STYLES,
    summary: formatPlanSummary(summarizeBuckets(buckets)),
    hasGeneratedAt: options.generatedAt !== undefined,
    generatedAt: options.generatedAt?.toISOString() ?? '',
    tabs,
    sections,
  });
}

function sectionId(category: Category): string {
  return `category-${category}`;
}
