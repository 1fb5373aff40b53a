import assert from 'node:assert/strict';
import path from 'node:path';
import test from 'node:test';

import { CatalogInterface, isWithdrawn } from '../lib/catalog_interface.js';
import type { Catalog } from '../lib/catalog_model.js';
import { CatalogIntegrityError, NotFoundError } from '../lib/errors.js';
import { sampleAc1, sampleCatalog, sampleNestedCatalog } from './fixtures.js';
import { withTempCwd, writeFixtureFile } from './test_fs.js';

test('getCountOfControlsInCatalog counts nested and ungrouped controls', () => {
  const catalogInterface = new CatalogInterface(sampleCatalog());
  assert.equal(catalogInterface.getCountOfControlsInCatalog(true), 6);
  assert.equal(catalogInterface.getCountOfControlsInCatalog(false), 5);
});

test('getControl finds controls at any depth and rejects unknown ids', () => {
  const catalogInterface = new CatalogInterface(sampleCatalog());
  assert.equal(catalogInterface.getControl('au-4').title, 'Audit Log Storage');
  assert.equal(catalogInterface.getControl('pm-1').title, 'Program Plan');
  assert.deepEqual(catalogInterface.getControlEntry('au-4').groupPath, ['au', 'au-sub']);
  assert.equal(catalogInterface.getControlEntry('pm-1').group, null);

  assert.throws(() => catalogInterface.getControl('zz-9'), (error: unknown) => {
    assert.ok(error instanceof NotFoundError);
    assert.equal(error.message, "No control found for 'zz-9'");
    return true;
  });
});

test('replaceControl keeps the control position in its group', () => {
  const catalog = sampleCatalog();
  const catalogInterface = new CatalogInterface(catalog);

  const control = { ...catalogInterface.getControl('ac-2'), title: 'updated ac-2' };
  catalogInterface.replaceControl(control);
  assert.equal(catalogInterface.getControl('ac-2'), control);

  catalogInterface.updateCatalogControls();
  const ids = catalog.groups?.[0].controls?.map((entry) => entry.id);
  assert.deepEqual(ids, ['ac-1', 'ac-2', 'ac-3']);
  assert.equal(catalog.groups?.[0].controls?.[1].title, 'updated ac-2');
});

test('getCatalog reflects replacements without an explicit update', () => {
  const catalogInterface = new CatalogInterface(sampleCatalog());
  catalogInterface.replaceControl({ ...catalogInterface.getControl('au-4'), title: 'new storage title' });
  catalogInterface.replaceControl({ ...catalogInterface.getControl('pm-1'), title: 'new plan title' });

  const catalog = catalogInterface.getCatalog();
  assert.equal(catalog.groups?.[1].groups?.[0].controls?.[0].title, 'new storage title');
  assert.equal(catalog.controls?.[0].title, 'new plan title');
});

test('replaceControl rejects a control that is not indexed', () => {
  const catalogInterface = new CatalogInterface(sampleCatalog());
  assert.throws(() => catalogInterface.replaceControl({ id: 'new-1', title: 'New' }), NotFoundError);
});

test('duplicate control ids are a catalog integrity error', () => {
  const catalog = sampleCatalog();
  catalog.controls = [...(catalog.controls ?? []), { id: 'ac-1', title: 'Duplicate' }];
  assert.throws(() => new CatalogInterface(catalog), CatalogIntegrityError);
});

test('duplicate sibling group ids are a catalog integrity error', () => {
  const catalog: Catalog = {
    uuid: 'u-1',
    metadata: { title: 'Groups', version: '1' },
    groups: [
      { id: 'g', title: 'One' },
      { id: 'g', title: 'Two' }
    ]
  };
  assert.throws(() => new CatalogInterface(catalog), /Group id 'g' appears more than once under the catalog root/);
});

test('deleteWithdrawnControls removes withdrawn controls and is idempotent', () => {
  const catalog = sampleCatalog();
  const catalogInterface = new CatalogInterface(catalog);

  catalogInterface.deleteWithdrawnControls();
  catalogInterface.deleteWithdrawnControls();

  assert.deepEqual(
    catalog.groups?.[0].controls?.map((entry) => entry.id),
    ['ac-1', 'ac-2']
  );
  assert.equal(catalogInterface.getCountOfControlsInCatalog(true), 5);
  assert.equal(catalogInterface.hasControl('ac-3'), false);
});

test('isWithdrawn matches the status property case-insensitively', () => {
  assert.equal(isWithdrawn({ id: 'x', title: 'x', props: [{ name: 'status', value: ' withdrawn ' }] }), true);
  assert.equal(isWithdrawn({ id: 'x', title: 'x', props: [{ name: 'status', value: 'active' }] }), false);
  assert.equal(isWithdrawn({ id: 'x', title: 'x' }), false);
});

test('sub-controls are indexed with their parent and follow a withdrawn parent', () => {
  const catalogInterface = new CatalogInterface(sampleNestedCatalog());

  assert.equal(catalogInterface.getCountOfControlsInCatalog(true), 4);
  assert.equal(catalogInterface.getCountOfControlsInCatalog(false), 2);
  assert.equal(catalogInterface.hasControl('ac-2.2.1'), true);

  const entry = catalogInterface.getControlEntry('ac-2.1');
  assert.equal(entry.parentId, 'ac-2');
  assert.deepEqual(entry.groupPath, ['ac']);
  assert.equal(catalogInterface.getControlEntry('ac-2').parentId, null);
  assert.deepEqual(
    Array.from(catalogInterface.getAllControls(false), (active) => active.control.id),
    ['ac-2', 'ac-2.1']
  );
});

test('replaceControl and deleteWithdrawnControls reach sub-controls', () => {
  const catalog = sampleNestedCatalog();
  const catalogInterface = new CatalogInterface(catalog);

  catalogInterface.replaceControl({ ...catalogInterface.getControl('ac-2.1'), title: 'updated ac-2.1' });
  catalogInterface.deleteWithdrawnControls();

  const subControls = catalog.groups?.[0].controls?.[0].controls;
  assert.deepEqual(
    subControls?.map((control) => [control.id, control.title]),
    [['ac-2.1', 'updated ac-2.1']]
  );
  assert.equal(catalogInterface.hasControl('ac-2.2'), false);
  assert.equal(catalogInterface.hasControl('ac-2.2.1'), false);
  assert.equal(catalogInterface.getCountOfControlsInCatalog(true), 2);
});

test('a sub-control reusing a control id is a catalog integrity error', () => {
  const catalog = sampleNestedCatalog();
  catalog.groups?.[0].controls?.[0].controls?.push({ id: 'ac-2', title: 'Duplicate' });
  assert.throws(() => new CatalogInterface(catalog), /Control id 'ac-2' appears more than once in the catalog/);
});

test('getAllGroupsFromCatalog walks groups parents first and can restart', () => {
  const catalogInterface = new CatalogInterface(sampleCatalog());
  const ids = Array.from(catalogInterface.getAllGroupsFromCatalog(), (group) => group.id);
  assert.deepEqual(ids, ['ac', 'au', 'au-sub']);
  assert.equal(Array.from(catalogInterface.getAllGroupsFromCatalog()).length, 3);
});

test('mergeControls with an identical control changes nothing', () => {
  for (const replaceParams of [true, false]) {
    const base = sampleAc1();
    CatalogInterface.mergeControls(base, sampleAc1(), replaceParams);
    assert.deepEqual(base, sampleAc1());
  }
});

test('mergeControls takes incoming values only when replacing params', () => {
  for (const replaceParams of [true, false]) {
    const base = sampleAc1();
    const incoming = sampleAc1();
    incoming.params = (incoming.params ?? []).map((param) =>
      param.id === 'ac-1_prm_1' ? { ...param, values: ['new value'] } : param
    );

    CatalogInterface.mergeControls(base, incoming, replaceParams);
    const expected = replaceParams ? ['new value'] : ['all staff'];
    assert.deepEqual(base.params?.[0].values, expected);
    assert.equal(base.params?.[0].label, 'organization-defined personnel');
  }
});

test('mergeControls narrows params to the incoming ids regardless of replaceParams', () => {
  for (const replaceParams of [true, false]) {
    const base = sampleAc1();
    const incoming = sampleAc1();
    incoming.params = incoming.params?.slice(0, 1);

    CatalogInterface.mergeControls(base, incoming, replaceParams);
    assert.deepEqual(
      base.params?.map((param) => param.id),
      ['ac-1_prm_1']
    );
  }
});

test('mergeControls keeps base params when incoming declares none', () => {
  const base = sampleAc1();
  const incoming = sampleAc1();
  delete incoming.params;

  CatalogInterface.mergeControls(base, incoming, true);
  assert.deepEqual(base.params, sampleAc1().params);
});

test('mergeControls appends params new to the base', () => {
  const base = sampleAc1();
  const incoming = sampleAc1();
  incoming.params = [...(incoming.params ?? []), { id: 'ac-1_prm_4', values: ['extra'] }];

  CatalogInterface.mergeControls(base, incoming, false);
  assert.deepEqual(base.params?.[3], { id: 'ac-1_prm_4', values: ['extra'] });
});

test('mergeControls replaces parts and leaves properties alone', () => {
  const base = sampleAc1();
  const incoming = sampleAc1();
  incoming.parts = [{ id: 'ac-1_smt', name: 'statement', prose: 'Rewritten.' }];
  incoming.props = [{ name: 'status', value: 'Withdrawn' }];

  CatalogInterface.mergeControls(base, incoming, false);
  assert.deepEqual(base.parts, [{ id: 'ac-1_smt', name: 'statement', prose: 'Rewritten.' }]);
  assert.deepEqual(base.props, [{ name: 'sort-id', value: 'ac-01' }]);

  incoming.parts[0].prose = 'changed later';
  assert.equal(base.parts?.[0].prose, 'Rewritten.');
});

test('mergeControls keeps the ids, names and extra properties of matching parts', () => {
  const base = sampleNestedCatalog().groups?.[0].controls?.[0];
  assert.ok(base);
  const incoming = {
    id: 'ac-2',
    title: 'Account Management',
    parts: [
      {
        id: 'ac-2_smt',
        name: 'statement',
        parts: [
          {
            id: 'ac-2_smt.a',
            name: 'item',
            props: [{ name: 'label', value: 'a.' }],
            prose: 'Define and document account types.'
          }
        ]
      },
      {
        id: 'ac-2_assessment-objective',
        name: 'assessment-objective',
        parts: [
          {
            id: 'ac-2_assessment-objective.AC02a01',
            name: 'item',
            props: [{ name: 'label', value: 'AC-02a.[01]' }],
            prose: 'account types are defined.'
          },
          {
            id: 'ac-2_assessment-objective.AC02a02',
            name: 'item',
            props: [{ name: 'label', value: 'AC-02a.[02]' }],
            prose: 'account types are documented.'
          }
        ]
      }
    ]
  };

  CatalogInterface.mergeControls(base, incoming, false);

  assert.deepEqual(base.parts?.[0].parts?.[0], {
    id: 'ac-2_smt.a',
    name: 'item',
    props: [
      { name: 'label', value: 'a.' },
      { name: 'sort-id', value: 'ac-02.a' }
    ],
    prose: 'Define and document account types.'
  });
  assert.equal(base.parts?.[1].id, 'ac-2_obj');
  assert.deepEqual(
    base.parts?.[1].parts?.map((part) => [part.id, part.name]),
    [
      ['ac-2_obj.a-1', 'assessment-objective'],
      ['ac-2_assessment-objective.AC02a02', 'item']
    ]
  );
  assert.deepEqual(
    base.controls?.map((control) => control.id),
    ['ac-2.1', 'ac-2.2']
  );
});

test('getSortedControlPaths finds control files in nested group directories', async () => {
  await withTempCwd('catalog-interface-paths-', async (root) => {
    await writeFixtureFile(root, 'md/ac/ac-10.md', '# ac-10 - Ten');
    await writeFixtureFile(root, 'md/ac/ac-2.md', '# ac-2 - Two');
    await writeFixtureFile(root, 'md/au/sub/au-4.md', '# au-4 - Four');
    await writeFixtureFile(root, 'md/s.1.1.1.md', '# s.1.1.1 - Nested id');
    await writeFixtureFile(root, 'md/ac/notes.txt', 'not markdown');

    const paths = await CatalogInterface.getSortedControlPaths(path.join(root, 'md'));
    assert.deepEqual(
      paths.map((filePath) => path.relative(root, filePath).split(path.sep).join('/')),
      ['md/ac/ac-2.md', 'md/ac/ac-10.md', 'md/au/sub/au-4.md', 'md/s.1.1.1.md']
    );
  });
});
