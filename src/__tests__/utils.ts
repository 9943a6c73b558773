/**
 * Test utilities and helper functions
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import type { Config } from '../config/schema.js';
import { defaultConfig } from '../config/defaults.js';
import { Logger } from '../logger/index.js';
import type { ToolCallResponse } from '../types/tools.js';

export const TEST_BASE_URL = 'https://doc.qt.io/archives/qt-4.8/';

/**
 * Canonical URL of a corpus page under the test base URL
 */
export function canonicalUrl(page: string): string {
  return `${TEST_BASE_URL}${page}`;
}

/**
 * Create a fresh temporary directory
 */
export async function createTempDir(prefix = 'qt-docs-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

/**
 * Logger that writes nowhere
 */
export function createTestLogger(): Logger {
  return new Logger({ ...defaultConfig.logging, level: 'error', toFile: false, silent: true });
}

/**
 * Configuration rooted in a temporary workspace
 */
export function createTestConfig(workspace: string, overrides: Partial<Config> = {}): Config {
  return {
    ...structuredClone(defaultConfig),
    corpus: { root: path.join(workspace, 'corpus'), baseUrl: TEST_BASE_URL },
    cache: { dir: path.join(workspace, 'cache'), memoryEntries: 16, warmOnStart: false },
    index: { path: path.join(workspace, 'index', 'fts.sqlite'), buildOnStart: false },
    logging: { ...defaultConfig.logging, level: 'error', toFile: false, silent: true },
    ...overrides,
  };
}

/**
 * Parse the JSON text carried by a tool response
 */
export function responseJson(response: ToolCallResponse): unknown {
  const [first] = response.content;
  if (first?.type !== 'text') {
    throw new Error('Expected a text content block');
  }
  return JSON.parse(first.text);
}

/**
 * Write pages (path relative to the corpus root -> HTML) to disk
 */
export async function writeCorpus(root: string, pages: Record<string, string | Buffer>): Promise<void> {
  await fs.mkdir(root, { recursive: true });
  for (const [page, content] of Object.entries(pages)) {
    const filePath = path.join(root, ...page.split('/'));
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content);
  }
}

/**
 * Wrap content in the archive's page layout, chrome included
 */
export function qtPage(title: string, content: string): string {
  return [
    '<!DOCTYPE html>',
    '<html lang="en">',
    `<head><title>${title} | Reference Documentation</title><script>var loaded = true;</script></head>`,
    '<body>',
    '<div class="header" id="qtdocheader"><a href="index.html">Home</a></div>',
    '<div class="wrapper">',
    '<div class="sidebar"><a href="modules.html">All Modules</a></div>',
    '<div class="content mainContent">',
    '<div class="breadcrumbs"><a href="index.html">Home</a> / <a href="classes.html">Classes</a></div>',
    content,
    '</div>',
    '</div>',
    '<div class="ft"><span>Footer text</span></div>',
    '</body>',
    '</html>',
  ].join('\n');
}

/**
 * Class reference page with a detailed description and one member section
 */
export const QSTRING_CONTENT = [
  '<h1 class="title">QString Class Reference</h1>',
  '<p>The QString class provides a Unicode character string.</p>',
  '<p>See also <a href="qstringlist.html">QStringList</a> and <a href="http://example.com/external">External</a>.</p>',
  '<a name="details"></a>',
  '<h2>Detailed Description</h2>',
  '<p>QString stores a string of 16-bit QChars.</p>',
  '<h3 class="fn"><a name="append"></a>QString append ( const QString str )</h3>',
  '<p>Appends the string str onto the end of this string. See <a href="qbytearray.html#append">QByteArray append</a>.</p>',
  '<h2 id="members">Member Function Documentation</h2>',
  '<p>Members follow.</p>',
].join('');

export const QSTRING_BODY = [
  '# QString Class Reference',
  '',
  'The QString class provides a Unicode character string.',
  '',
  'See also [QStringList](https://doc.qt.io/archives/qt-4.8/qstringlist.html) and [External](http://example.com/external).',
  '',
  '## Detailed Description',
  '',
  'QString stores a string of 16-bit QChars.',
  '',
  '### QString append ( const QString str )',
  '',
  'Appends the string str onto the end of this string. See [QByteArray append](https://doc.qt.io/archives/qt-4.8/qbytearray.html#append).',
  '',
  '## Member Function Documentation',
  '',
  'Members follow.',
].join('\n');

/**
 * A small corpus: class pages, a guide and two identical pages
 */
export function sampleCorpus(): Record<string, string> {
  return {
    'qstring.html': qtPage('QString Class Reference', QSTRING_CONTENT),
    'qstringlist.html': qtPage(
      'QStringList Class Reference',
      '<h1>QStringList Class Reference</h1><p>The QStringList class provides a list of QString values.</p>'
    ),
    'signalsandslots.html': qtPage(
      'Signals and Slots',
      '<h1>Signals and Slots</h1><p>Objects communicate through connections between emitters and receivers.</p>'
    ),
    'qwidget.html': qtPage(
      'QWidget Class Reference',
      '<h1>QWidget Class Reference</h1><p>Widgets emit signals when their state changes.</p>'
    ),
    'dup-a.html': qtPage('Duplicate Page', '<h1>Duplicate Page</h1><p>The duplicateterm appears here.</p>'),
    'dup-b.html': qtPage('Duplicate Page', '<h1>Duplicate Page</h1><p>The duplicateterm appears here.</p>'),
    'tutorials/addressbook.html': qtPage(
      'Address Book Tutorial',
      '<h1>Address Book Tutorial</h1><p>This tutorial builds a small address book application.</p>'
    ),
  };
}
