import { describe, expect, it } from 'vitest';
import { InvalidInputError } from '../error/invalidInputError.js';
import { queryEntries, type RequestSpecification, usePost, validateSpecification } from './specification.js';

function messageOf(spec: RequestSpecification): string | undefined {
  const [err] = validateSpecification(spec, 'normal');
  return err?.message;
}

describe('validateSpecification', () => {
  it('accepts a complete specification', () => {
    const spec: RequestSpecification = {
      domain: 'compound',
      namespace: { domain: 'compound', kind: 'cid' },
      identifiers: { kind: 'ids', ids: [2244, 962] },
      operation: { domain: 'compound', kind: 'property', tags: ['MolecularWeight'] },
    };

    expect(validateSpecification(spec, 'normal')).toEqual([null, spec]);
  });

  it('accepts a bare auxiliary domain', () => {
    expect(validateSpecification({ domain: 'sources/substance' }, 'normal')[0]).toBeNull();
  });

  it('checks the namespace against the domain', () => {
    expect(messageOf({ domain: 'sources/substance', namespace: { domain: 'compound', kind: 'cid' } })).toBe(
      'domain sources/substance takes no namespace',
    );
    expect(messageOf({ domain: 'compound', identifiers: { kind: 'id', id: 1 } })).toBe(
      'domain compound requires a namespace',
    );
    expect(
      messageOf({ domain: 'substance', namespace: { domain: 'compound', kind: 'cid' }, identifiers: { kind: 'id', id: 1 } }),
    ).toBe('namespace cid belongs to compound, not substance');
  });

  it('rejects a blank source or column', () => {
    expect(
      messageOf({
        domain: 'substance',
        namespace: { domain: 'substance', kind: 'sourceall', source: '' },
        identifiers: { kind: 'text', text: 'x' },
      }),
    ).toBe('namespace sourceall has a blank source');
    expect(
      messageOf({
        domain: 'substance',
        namespace: { domain: 'substance', kind: 'sourceid', source: '  ' },
        identifiers: { kind: 'text', text: '747285' },
      }),
    ).toBe('namespace sourceid has a blank source');
    expect(
      messageOf({ domain: 'assay', namespace: { domain: 'assay', kind: 'activity', column: '' }, identifiers: { kind: 'id', id: 1 } }),
    ).toBe('namespace activity has a blank column');
  });

  it('checks identifiers', () => {
    expect(messageOf({ domain: 'compound', namespace: { domain: 'compound', kind: 'cid' } })).toBe(
      'domain compound requires identifiers',
    );
    expect(
      messageOf({
        domain: 'compound',
        namespace: { domain: 'compound', kind: 'cid' },
        identifiers: { kind: 'ids', ids: [] },
      }),
    ).toBe('identifier list must not be empty');
  });

  it('checks the identifier shape against the namespace', () => {
    expect(
      messageOf({
        domain: 'compound',
        namespace: { domain: 'compound', kind: 'cid' },
        identifiers: { kind: 'text', text: 'aspirin' },
      }),
    ).toBe('namespace compound/cid takes numeric identifiers, got text');
    expect(
      messageOf({
        domain: 'compound',
        namespace: { domain: 'compound', kind: 'structure', search: 'substructure', input: 'cid' },
        identifiers: { kind: 'ids', ids: [1, 2] },
      }),
    ).toBe('namespace compound/substructure/cid takes exactly one numeric identifier');
    expect(
      messageOf({
        domain: 'compound',
        namespace: { domain: 'compound', kind: 'smiles' },
        identifiers: { kind: 'id', id: 1 },
      }),
    ).toBe('namespace compound/smiles takes a text identifier, got numbers');
  });

  it('checks the operation', () => {
    const base: RequestSpecification = {
      domain: 'compound',
      namespace: { domain: 'compound', kind: 'cid' },
      identifiers: { kind: 'id', id: 2244 },
    };

    expect(messageOf({ ...base, operation: { domain: 'assay', kind: 'concise' } })).toBe(
      'operation concise belongs to assay, not compound',
    );
    expect(messageOf({ ...base, operation: { domain: 'compound', kind: 'property', tags: [] } })).toBe(
      'operation property needs at least one entry',
    );
    expect(messageOf({ ...base, operation: { domain: 'compound', kind: 'property', tags: ['XLogP', ' '] } })).toBe(
      'operation property has a blank entry',
    );
    expect(messageOf({ domain: 'conformers', operation: { domain: 'compound', kind: 'record' } })).toBe(
      'domain conformers takes no operation',
    );
  });

  it('reports the first failing check', () => {
    expect(messageOf({ domain: 'compound', identifiers: { kind: 'ids', ids: [] } })).toBe(
      'domain compound requires a namespace',
    );
  });

  it('returns InvalidInputError, or throws it under panic', () => {
    const spec: RequestSpecification = { domain: 'compound' };

    expect(validateSpecification(spec, 'normal')[0]).toBeInstanceOf(InvalidInputError);
    expect(() => validateSpecification(spec, 'panic')).toThrow(InvalidInputError);
  });
});

describe('usePost', () => {
  it('follows the namespace', () => {
    expect(usePost({ domain: 'compound', namespace: { domain: 'compound', kind: 'smiles' } })).toBe(true);
    expect(usePost({ domain: 'compound', namespace: { domain: 'compound', kind: 'cid' } })).toBe(false);
    expect(usePost({ domain: 'periodictable' })).toBe(false);
  });
});

describe('queryEntries', () => {
  it('puts integer-like keys of a plain object first', () => {
    expect(queryEntries({ record_type: '3d', '10': 'x' })).toEqual([
      ['10', 'x'],
      ['record_type', '3d'],
    ]);
    expect(
      queryEntries(
        new Map([
          ['record_type', '3d'],
          ['10', 'x'],
        ]),
      ),
    ).toEqual([
      ['record_type', '3d'],
      ['10', 'x'],
    ]);
  });

  it('keeps insertion order', () => {
    expect(queryEntries({ b: '1', a: '2' })).toEqual([
      ['b', '1'],
      ['a', '2'],
    ]);
    expect(
      queryEntries(
        new Map([
          ['z', '1'],
          ['y', '2'],
        ]),
      ),
    ).toEqual([
      ['z', '1'],
      ['y', '2'],
    ]);
    expect(queryEntries(undefined)).toEqual([]);
  });
});
