import type { Catalog, Control, Profile } from '../lib/catalog_model.js';

export function sampleAc1(): Control {
  return {
    id: 'ac-1',
    title: 'Policy and Procedures',
    params: [
      { id: 'ac-1_prm_1', label: 'organization-defined personnel', values: ['all staff'] },
      {
        id: 'ac-1_prm_2',
        label: 'organization-defined frequency',
        select: { choice: ['monthly', 'quarterly'] }
      },
      { id: 'ac-1_prm_3', label: 'organization-defined events' }
    ],
    props: [{ name: 'sort-id', value: 'ac-01' }],
    parts: [
      {
        id: 'ac-1_smt',
        name: 'statement',
        prose: 'The organization:',
        parts: [
          {
            id: 'ac-1_smt.a',
            name: 'item',
            props: [{ name: 'label', value: 'a.' }],
            prose: 'Develops a policy for {{ insert: param, ac-1_prm_1 }};',
            parts: [
              {
                id: 'ac-1_smt.a.1',
                name: 'item',
                props: [{ name: 'label', value: '1.' }],
                prose: 'Reviews the policy {{ insert: param, ac-1_prm_2 }}.'
              }
            ]
          },
          {
            id: 'ac-1_smt.b',
            name: 'item',
            props: [{ name: 'label', value: 'b.' }],
            prose: 'Responds to {{ insert: param, ac-1_prm_3 }}.'
          }
        ]
      },
      { id: 'ac-1_gdn', name: 'guidance', prose: 'Policy guidance text.' }
    ]
  };
}

function simpleControl(id: string, title: string, prose: string): Control {
  return {
    id,
    title,
    parts: [{ id: `${id}_smt`, name: 'statement', prose }]
  };
}

/**
 * Six controls: two groups (one nested) plus one ungrouped control; `ac-3`
 * is withdrawn.
 */
export function sampleCatalog(): Catalog {
  return {
    uuid: '00000000-0000-4000-8000-000000000001',
    metadata: {
      title: 'Sample Control Catalog',
      version: '1.0',
      'last-modified': '2024-01-01T00:00:00.000Z',
      'oscal-version': '1.0.4'
    },
    groups: [
      {
        id: 'ac',
        title: 'Access Control',
        controls: [
          sampleAc1(),
          {
            id: 'ac-2',
            title: 'Account Management',
            params: [{ id: 'ac-2_prm_1', values: ['30 days'] }],
            parts: [
              {
                id: 'ac-2_smt',
                name: 'statement',
                prose: 'Disable inactive accounts after {{ insert: param, ac-2_prm_1 }}.'
              }
            ]
          },
          {
            id: 'ac-3',
            title: 'Access Enforcement',
            props: [{ name: 'status', value: 'Withdrawn' }]
          }
        ]
      },
      {
        id: 'au',
        title: 'Audit',
        controls: [simpleControl('au-1', 'Audit Policy', 'Audit security events.')],
        groups: [
          {
            id: 'au-sub',
            title: 'Audit Storage',
            controls: [simpleControl('au-4', 'Audit Log Storage', 'Allocate audit storage.')]
          }
        ]
      }
    ],
    controls: [simpleControl('pm-1', 'Program Plan', 'Maintain a security program plan.')]
  };
}

/**
 * `ac-2` with an objective whose labels contain brackets and two sub-controls;
 * `ac-2.2` is withdrawn along with the control nested in it. The `ac-2.1`
 * parameter carries `guidelines`, a field the model does not declare.
 */
export function sampleNestedCatalog(): Catalog {
  const frequency = {
    id: 'ac-2.1_prm_1',
    values: ['daily'],
    guidelines: [{ prose: 'Pick a review frequency.' }]
  };
  return {
    uuid: '00000000-0000-4000-8000-000000000003',
    metadata: {
      title: 'Nested Control Catalog',
      version: '1.0',
      'last-modified': '2024-01-01T00:00:00.000Z',
      'oscal-version': '1.0.4'
    },
    groups: [
      {
        id: 'ac',
        title: 'Access Control',
        controls: [
          {
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
                    props: [
                      { name: 'label', value: 'a.' },
                      { name: 'sort-id', value: 'ac-02.a' }
                    ],
                    prose: 'Define account types.'
                  }
                ]
              },
              {
                id: 'ac-2_obj',
                name: 'assessment-objective',
                parts: [
                  {
                    id: 'ac-2_obj.a-1',
                    name: 'assessment-objective',
                    props: [{ name: 'label', value: 'AC-02a.[01]' }],
                    prose: 'account types are defined.'
                  }
                ]
              }
            ],
            controls: [
              {
                id: 'ac-2.1',
                title: 'Automated Account Management',
                params: [frequency],
                parts: [
                  {
                    id: 'ac-2.1_smt',
                    name: 'statement',
                    prose: 'Review accounts {{ insert: param, ac-2.1_prm_1 }}.'
                  }
                ]
              },
              {
                id: 'ac-2.2',
                title: 'Removal of Temporary Accounts',
                props: [{ name: 'status', value: 'withdrawn' }],
                controls: [{ id: 'ac-2.2.1', title: 'Temporary Account Expiry' }]
              }
            ]
          }
        ]
      }
    ]
  };
}

export function sampleProfile(): Profile {
  return {
    uuid: '00000000-0000-4000-8000-000000000002',
    metadata: { title: 'Sample Profile', version: '1.0' },
    imports: [{ href: 'catalog.json' }],
    modify: {
      'set-parameters': [
        { 'param-id': 'ac-1_prm_1', values: ['all alert personnel'] },
        { 'param-id': 'ac-1_prm_2', values: ['weekly'] },
        { 'param-id': 'ac-1_prm_2', values: ['monthly'] }
      ]
    }
  };
}
