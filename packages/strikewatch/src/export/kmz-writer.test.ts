import JSZip from 'jszip';
import { existsSync, mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { StrikeRow } from '../core/types.js';
import { buildKml, buildKmz, escapeXml, kmlColor, styleForQuality, writeKmz } from './kmz-writer.js';

const row = (quality: number | null, lat: number | null = 45.5, lon: number | null = 4.8): StrikeRow => ({
  timestamp: '2024-06-01T00:10:00.000Z',
  lat,
  lon,
  quality,
});

describe('styleForQuality', () => {
  it.each([
    [0, 'red'],
    [149, 'red'],
    [150, 'orange'],
    [299, 'orange'],
    [300, 'yellow'],
    [null, 'grey'],
    [Number.NaN, 'grey'],
  ] as const)('should map %s to %s', (quality, style) => {
    expect(styleForQuality(quality)).toBe(style);
  });

  it('should use custom bands', () => {
    expect(styleForQuality(60, { goodBelow: 50, mediumBelow: 100 })).toBe('orange');
  });
});

describe('kmlColor', () => {
  it('should reorder to aabbggrr', () => {
    expect(kmlColor('#ff7f00')).toBe('ff007fff');
    expect(kmlColor('#123456', '80')).toBe('80563412');
  });
});

describe('escapeXml', () => {
  it('should escape markup characters', () => {
    expect(escapeXml(`Lyon & <"Co'>`)).toBe('Lyon &amp; &lt;&quot;Co&apos;&gt;');
  });
});

describe('buildKml', () => {
  it('should write one placemark per located strike', () => {
    const kml = buildKml([row(120), row(200), row(null), row(90, null, 4.8)]);

    expect(kml.match(/<Placemark>/g)).toHaveLength(3);
    expect(kml).toContain('<Document><name>impacts</name>');
    expect(kml).toContain('    <styleUrl>#red</styleUrl>');
    expect(kml).toContain('    <styleUrl>#orange</styleUrl>');
    expect(kml).toContain('    <styleUrl>#grey</styleUrl>');
    expect(kml).toContain('    <description>quality: NaN</description>');
    expect(kml).toContain('    <TimeStamp><when>2024-06-01T00:10:00.000Z</when></TimeStamp>');
    expect(kml).toContain('    <Point><coordinates>4.8,45.5,0</coordinates></Point>');
    expect(kml).not.toContain('<LookAt>');
  });

  it('should add a camera and pin for the centre', () => {
    const kml = buildKml([], { name: 'Lyon & co', center: { lat: 45.76, lon: 4.84 } });

    expect(kml).toContain('<Document><name>Lyon &amp; co</name>');
    expect(kml).toContain('    <range>20000</range>');
    expect(kml).toContain('    <styleUrl>#center</styleUrl>');
    expect(kml).toContain('    <Point><coordinates>4.84,45.76,0</coordinates></Point>');
  });
});

describe('buildKmz', () => {
  it('should zip the document as doc.kml', async () => {
    const rows = [row(120)];
    const zip = await JSZip.loadAsync(await buildKmz(rows));

    expect(Object.keys(zip.files)).toEqual(['doc.kml']);
    await expect(zip.file('doc.kml')?.async('string')).resolves.toBe(buildKml(rows));
  });
});

describe('writeKmz', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'strikewatch-kmz-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it.each([
    ['out.kml', 'out.kmz'],
    ['out', 'out.kmz'],
    ['OUT.KMZ', 'OUT.KMZ'],
  ])('should write %s as %s', async (name, expected) => {
    const written = await writeKmz([row(120)], join(dir, name));

    expect(written).toBe(join(dir, expected));
    expect(existsSync(written)).toBe(true);
  });
});
