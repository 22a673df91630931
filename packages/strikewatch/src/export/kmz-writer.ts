/**
 * KMZ overlay writer
 *
 * Renders strikes as a Google Earth document: one coloured circle per
 * strike, coloured by quality band, with an optional purple pin and
 * camera on the query centre. The KML is zipped as `doc.kml`.
 */

import JSZip from 'jszip';
import { extname } from 'node:path';
import type { QualityBands } from '../core/config.js';
import type { GeoPoint, StrikeRow } from '../core/types.js';
import { atomicWriteFile } from '../core/utils/atomic-write.js';

export type QualityStyle = 'red' | 'orange' | 'yellow' | 'grey';

/** #rrggbb per style */
const STYLE_RGB: Record<QualityStyle, string> = {
  red: '#ff0000',
  orange: '#ff7f00',
  yellow: '#ffff00',
  grey: '#7f7f7f',
};

const CIRCLE_ICON = 'http://maps.google.com/mapfiles/kml/shapes/placemark_circle.png';
const CENTER_ICON = 'https://earth.google.com/images/kml-icons/pushpin/purple-pushpin.png';

/** Camera distance above the centre, metres */
const LOOK_AT_RANGE_M = 20_000;

export const DEFAULT_QUALITY_BANDS: QualityBands = { goodBelow: 150, mediumBelow: 300 };

export interface KmlOptions {
  /** Layer name shown in Google Earth */
  readonly name?: string;
  readonly center?: GeoPoint;
  readonly bands?: QualityBands;
}

/**
 * `#rrggbb` → KML's `aabbggrr`
 */
export function kmlColor(rgbHex: string, alpha = 'ff'): string {
  const rr = rgbHex.slice(1, 3);
  const gg = rgbHex.slice(3, 5);
  const bb = rgbHex.slice(5, 7);
  return `${alpha}${bb}${gg}${rr}`;
}

export function styleForQuality(
  quality: number | null,
  bands: QualityBands = DEFAULT_QUALITY_BANDS
): QualityStyle {
  if (quality === null || Number.isNaN(quality)) return 'grey';
  if (quality < bands.goodBelow) return 'red';
  if (quality < bands.mediumBelow) return 'orange';
  return 'yellow';
}

export function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

function styleBlock(id: QualityStyle): string {
  return [
    `  <Style id="${id}">`,
    '    <IconStyle>',
    '      <scale>0.8</scale>',
    `      <color>${kmlColor(STYLE_RGB[id])}</color>`,
    `      <Icon><href>${CIRCLE_ICON}</href></Icon>`,
    '    </IconStyle>',
    '  </Style>',
  ].join('\n');
}

function centerStyleBlock(): string {
  return [
    '  <Style id="center">',
    '    <IconStyle>',
    '      <scale>1.4</scale>',
    `      <Icon><href>${CENTER_ICON}</href></Icon>`,
    '    </IconStyle>',
    '  </Style>',
  ].join('\n');
}

/**
 * Build the KML document. Rows without both coordinates are skipped.
 */
export function buildKml(rows: readonly StrikeRow[], options: KmlOptions = {}): string {
  const bands = options.bands ?? DEFAULT_QUALITY_BANDS;
  const parts: string[] = [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<kml xmlns="http://www.opengis.net/kml/2.2">',
    `<Document><name>${escapeXml(options.name ?? 'impacts')}</name>`,
  ];

  for (const id of Object.keys(STYLE_RGB)) {
    if (id === 'red' || id === 'orange' || id === 'yellow' || id === 'grey') {
      parts.push(styleBlock(id));
    }
  }
  parts.push(centerStyleBlock());

  if (options.center) {
    const { lat, lon } = options.center;
    parts.push(
      [
        '  <LookAt>',
        `    <longitude>${lon}</longitude>`,
        `    <latitude>${lat}</latitude>`,
        '    <altitude>0</altitude>',
        `    <range>${LOOK_AT_RANGE_M}</range>`,
        '    <tilt>0</tilt><heading>0</heading>',
        '    <altitudeMode>relativeToGround</altitudeMode>',
        '  </LookAt>',
        '  <Placemark>',
        '    <name>centre</name>',
        '    <styleUrl>#center</styleUrl>',
        `    <Point><coordinates>${lon},${lat},0</coordinates></Point>`,
        '  </Placemark>',
      ].join('\n')
    );
  }

  for (const row of rows) {
    if (row.lat === null || row.lon === null) continue;
    const style = styleForQuality(row.quality, bands);
    parts.push(
      [
        '  <Placemark>',
        `    <TimeStamp><when>${escapeXml(row.timestamp)}</when></TimeStamp>`,
        `    <styleUrl>#${style}</styleUrl>`,
        `    <description>quality: ${row.quality === null ? 'NaN' : row.quality}</description>`,
        `    <Point><coordinates>${row.lon},${row.lat},0</coordinates></Point>`,
        '  </Placemark>',
      ].join('\n')
    );
  }

  parts.push('</Document></kml>');
  return parts.join('\n');
}

/**
 * Zip KML as `doc.kml` (DEFLATE)
 */
export async function buildKmz(rows: readonly StrikeRow[], options: KmlOptions = {}): Promise<Buffer> {
  const zip = new JSZip();
  zip.file('doc.kml', buildKml(rows, options));
  return zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' });
}

/**
 * Write a KMZ file; the extension is forced to `.kmz`.
 *
 * @returns the path written
 */
export async function writeKmz(
  rows: readonly StrikeRow[],
  outputPath: string,
  options: KmlOptions = {}
): Promise<string> {
  const ext = extname(outputPath);
  const target =
    ext.toLowerCase() === '.kmz'
      ? outputPath
      : `${ext ? outputPath.slice(0, -ext.length) : outputPath}.kmz`;
  await atomicWriteFile(target, await buildKmz(rows, options));
  return target;
}
