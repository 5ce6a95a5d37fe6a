/**
 * Tests for the ASN range extractor
 */

import { describe, it, expect } from 'vitest';
import { readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import { collectAsnFields, extractRanges, selectRanges } from '../src/core/asn.js';
import { useTempDir } from './helpers.js';

const TABLE = JSON.stringify(
  [
    { start_ip: '10.0.0.0', end_ip: '10.0.0.255', country_name: 'Sweden' },
    { start_ip: '10.1.0.0', end_ip: '10.1.255.255', country_name: 'Norway' },
    { start_ip: '2001:db8::', end_ip: '2001:db8::ffff', country_name: 'Norway' },
    { start_ip: '10.2.0.0', end_ip: '10.2.0.127', country_name: 'Denmark' },
  ],
  null,
  2
);

describe('collectAsnFields', () => {
  it('should collect fields in document order', () => {
    const fields = collectAsnFields(TABLE);

    expect(fields.starts).toEqual(['10.0.0.0', '10.1.0.0', '2001:db8::', '10.2.0.0']);
    expect(fields.ends).toEqual(['10.0.0.255', '10.1.255.255', '2001:db8::ffff', '10.2.0.127']);
    expect(fields.countries).toEqual(['Sweden', 'Norway', 'Norway', 'Denmark']);
  });

  it('should not need the document to be valid JSON', () => {
    const text = '"start_ip" : "1.1.1.0", "end_ip":"1.1.1.255" garbage {{ "start_ip":"2.2.2.0"';

    const fields = collectAsnFields(text);

    expect(fields.starts).toEqual(['1.1.1.0', '2.2.2.0']);
    expect(fields.ends).toEqual(['1.1.1.255']);
    expect(fields.countries).toEqual([]);
  });
});

describe('selectRanges', () => {
  it('should drop IPv6 ranges when unfiltered', () => {
    const ranges = selectRanges(collectAsnFields(TABLE));

    expect(ranges).toEqual([
      { startIp: '10.0.0.0', endIp: '10.0.0.255' },
      { startIp: '10.1.0.0', endIp: '10.1.255.255' },
      { startIp: '10.2.0.0', endIp: '10.2.0.127' },
    ]);
  });

  it('should skip records beyond the country sequence when filtering', () => {
    const ranges = selectRanges(
      { starts: ['1.0.0.0', '2.0.0.0'], ends: ['1.0.0.9', '2.0.0.9'], countries: ['Chile'] },
      'chile'
    );

    expect(ranges).toEqual([{ startIp: '1.0.0.0', endIp: '1.0.0.9' }]);
  });

  it('should return null for mismatched or empty sequences', () => {
    expect(selectRanges({ starts: [], ends: [], countries: [] })).toBeNull();
    expect(selectRanges({ starts: ['1.0.0.0'], ends: [], countries: [] })).toBeNull();
  });
});

describe('extractRanges', () => {
  const tmp = useTempDir();

  it('should write only the ranges of the filtered country, ignoring case', async () => {
    const jsonPath = join(tmp.path(), 'country_asn.json');
    const listPath = join(tmp.path(), 'list');
    await writeFile(jsonPath, TABLE);

    const result = await extractRanges(jsonPath, listPath, 'NORWAY');

    expect(result).toEqual({ ok: true, value: { rangesWritten: 1 } });
    expect(await readFile(listPath, 'utf-8')).toBe('10.1.0.0-10.1.255.255\n');
  });

  it('should write exactly one range when one of three records matches', async () => {
    const jsonPath = join(tmp.path(), 'three.json');
    const listPath = join(tmp.path(), 'list');
    await writeFile(
      jsonPath,
      [
        '[',
        '{"start_ip": "1.0.0.0", "end_ip": "1.0.0.255", "country_name": "Finland"},',
        '{"start_ip": "2.0.0.0", "end_ip": "2.0.0.255", "country_name": "Norway"},',
        '{"start_ip": "3.0.0.0", "end_ip": "3.0.0.255", "country_name": "Iceland"}',
        ']',
      ].join('\n')
    );

    const result = await extractRanges(jsonPath, listPath, 'norway');

    expect(result).toEqual({ ok: true, value: { rangesWritten: 1 } });
    expect(await readFile(listPath, 'utf-8')).toBe('2.0.0.0-2.0.0.255\n');
  });

  it('should write every IPv4 range without a filter', async () => {
    const jsonPath = join(tmp.path(), 'country_asn.json');
    const listPath = join(tmp.path(), 'list');
    await writeFile(jsonPath, TABLE);

    const result = await extractRanges(jsonPath, listPath);

    expect(result).toEqual({ ok: true, value: { rangesWritten: 3 } });
    expect(await readFile(listPath, 'utf-8')).toBe(
      '10.0.0.0-10.0.0.255\n10.1.0.0-10.1.255.255\n10.2.0.0-10.2.0.127\n'
    );
  });

  it('should truncate an existing list file', async () => {
    const jsonPath = join(tmp.path(), 'country_asn.json');
    const listPath = join(tmp.path(), 'list');
    await writeFile(jsonPath, TABLE);
    await writeFile(listPath, 'stale-line\nanother\n');

    await extractRanges(jsonPath, listPath, 'denmark');

    expect(await readFile(listPath, 'utf-8')).toBe('10.2.0.0-10.2.0.127\n');
  });

  it('should fail with a parse error when start and end counts differ', async () => {
    const jsonPath = join(tmp.path(), 'broken.json');
    await writeFile(
      jsonPath,
      '[{"start_ip": "1.0.0.0", "end_ip": "1.0.0.255"}, {"start_ip": "2.0.0.0"}]'
    );

    const result = await extractRanges(jsonPath, join(tmp.path(), 'list'));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('parse');
    }
  });

  it('should fail softly when the filter matches nothing', async () => {
    const jsonPath = join(tmp.path(), 'country_asn.json');
    const listPath = join(tmp.path(), 'list');
    await writeFile(jsonPath, TABLE);

    const result = await extractRanges(jsonPath, listPath, 'Atlantis');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('empty');
      expect(result.error.message).toBe(`No IPv4 ranges found in ${jsonPath} for country "Atlantis"`);
    }
    expect(await readFile(listPath, 'utf-8')).toBe('');
  });

  it('should report an I/O error for a missing table', async () => {
    const result = await extractRanges(join(tmp.path(), 'missing.json'), join(tmp.path(), 'list'));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('io');
    }
  });
});
