import assert from 'node:assert/strict';
import path from 'node:path';
import test from 'node:test';

import { createValidator, loadMarkdownDocument, validateMarkdownDir } from '../lib/author/validate.js';
import type { ValidateOptions } from '../lib/author/validate.js';
import { IoFailureError } from '../lib/errors.js';
import { withTempCwd, writeFixtureFile } from './test_fs.js';

const template = `
---
title: Template
owner: someone
---

# {{ Title }}

## Overview

## Responsibilities

- Owner: someone

## Procedure
`;

const good = `
---
title: Access Policy
owner: Alice
---

# Access Policy

## Overview

## Responsibilities

- Owner: Alice

## Procedure

### Request access
`;

const missingProcedure = `
---
title: Audit Policy
owner: Bob
---

# Audit Policy

## Overview

## Responsibilities

- Owner: Bob
`;

function options(root: string, overrides: Partial<ValidateOptions> = {}): ValidateOptions {
  return {
    templatePath: path.join(root, 'docs/template.md'),
    markdownDir: path.join(root, 'docs'),
    validateHeader: true,
    validateBody: true,
    templateVersion: false,
    placeholderPattern: '\\{\\{.+?\\}\\}',
    ...overrides
  };
}

test('loadMarkdownDocument reads the YAML header and heading tree', async () => {
  await withTempCwd('author-validate-load-', async (root) => {
    const filePath = await writeFixtureFile(root, 'docs/good.md', good);
    const document = await loadMarkdownDocument(filePath);

    assert.deepEqual(Array.from(document.header.keys()), ['title', 'owner']);
    assert.deepEqual(document.header.get('owner'), { kind: 'leaf', value: 'Alice' });
    assert.deepEqual(document.tree.subnodesKeys, [
      '# Access Policy',
      '## Overview',
      '## Responsibilities',
      '## Procedure',
      '### Request access'
    ]);
  });
});

test('loadMarkdownDocument reports a missing file', async () => {
  await withTempCwd('author-validate-missing-', async () => {
    await assert.rejects(
      () => loadMarkdownDocument(path.resolve('templates/missing.md')),
      (error: unknown) => {
        assert.ok(error instanceof IoFailureError);
        assert.equal(error.message, 'templates/missing.md: markdown file does not exist');
        return true;
      }
    );
  });
});

test('validateMarkdownDir checks every file except the template and keeps going', async () => {
  await withTempCwd('author-validate-dir-', async (root) => {
    await writeFixtureFile(root, 'docs/template.md', template);
    await writeFixtureFile(root, 'docs/good.md', good);
    await writeFixtureFile(root, 'docs/bad.md', missingProcedure);
    await writeFixtureFile(root, 'docs/sub/other.md', good);

    const reports = await validateMarkdownDir(options(root, { governedHeading: 'Responsibilities' }));

    assert.deepEqual(
      reports.map((report) => [path.relative(root, report.filePath).split(path.sep).join('/'), report.result.valid]),
      [
        ['docs/bad.md', false],
        ['docs/good.md', true],
        ['docs/sub/other.md', true]
      ]
    );
    assert.deepEqual(reports[0].result, {
      valid: false,
      failedPass: 'body-headings',
      reason: "heading '## Procedure' was removed"
    });
  });
});

test('validateMarkdownDir reports unreadable front matter and keeps going', async () => {
  await withTempCwd('author-validate-front-matter-', async (root) => {
    await writeFixtureFile(root, 'docs/template.md', template);
    await writeFixtureFile(root, 'docs/bad.md', '---\na: [1\n---\n\n# Broken');
    await writeFixtureFile(root, 'docs/good.md', good);

    const reports = await validateMarkdownDir(options(root));

    assert.equal(reports.length, 2);
    const [bad, fine] = reports;
    assert.equal(bad.result.valid, false);
    assert.equal(bad.result.valid ? undefined : bad.result.failedPass, 'front-matter');
    assert.match(bad.result.valid ? '' : bad.result.reason, /^docs\/bad\.md has an invalid YAML header: /);
    assert.deepEqual(fine.result, { valid: true });
  });
});

test('validateMarkdownDir reports header key differences', async () => {
  await withTempCwd('author-validate-header-', async (root) => {
    await writeFixtureFile(root, 'docs/template.md', template);
    await writeFixtureFile(root, 'docs/extra.md', good.replace('owner: Alice', 'owner: Alice\nreviewer: Carol'));

    const [report] = await validateMarkdownDir(options(root));
    assert.deepEqual(report.result, {
      valid: false,
      failedPass: 'header-keys',
      reason: 'YAML header keys differ from template docs/template.md'
    });

    const [bodyOnly] = await validateMarkdownDir(options(root, { validateHeader: false }));
    assert.deepEqual(bodyOnly.result, { valid: true });
  });
});

test('validateMarkdownDir checks the template version against instance paths', async () => {
  await withTempCwd('author-validate-version-', async (root) => {
    await writeFixtureFile(
      root,
      'templates/policy.md',
      template.replace('owner: someone', "owner: someone\nx-template-version: '0.0.1'\nVersion: '0.0.1'")
    );
    await writeFixtureFile(root, 'docs/0.0.1/access.md', good);

    const reports = await validateMarkdownDir(
      options(root, {
        templatePath: path.join(root, 'templates/policy.md'),
        markdownDir: path.join(root, 'docs'),
        templateVersion: true
      })
    );
    assert.deepEqual(
      reports.map((report) => report.result),
      [{ valid: true }]
    );
  });
});

test('createValidator rejects an invalid placeholder pattern', async () => {
  await withTempCwd('author-validate-pattern-', async (root) => {
    await writeFixtureFile(root, 'docs/template.md', template);
    await assert.rejects(
      () => createValidator(options(root, { placeholderPattern: '(' })),
      /^Error: Invalid placeholder pattern '\('/
    );
  });
});
