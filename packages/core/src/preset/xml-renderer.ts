import type { LayerSlot, PadSpec, PresetDocument } from './types';

const INDENT = '  ';
const XML_DECLARATION = "<?xml version='1.0' encoding='utf-8'?>";

type Attributes = Array<[string, string]>;

export function escapeAttribute(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/\r/g, '&#13;')
    .replace(/\n/g, '&#10;')
    .replace(/\t/g, '&#09;');
}

/**
 * TAL-Drum writes numeric attributes as floats: 36 → "36.0".
 */
export function floatString(n: number): string {
  return Number.isInteger(n) ? n.toFixed(1) : String(n);
}

function openTag(name: string, attrs: Attributes, selfClosing = false): string {
  const rendered = attrs.map(([key, value]) => ` ${key}="${escapeAttribute(value)}"`).join('');
  return selfClosing ? `<${name}${rendered} />` : `<${name}${rendered}>`;
}

function layerAttributes(layer: LayerSlot): Attributes {
  const attrs: Attributes = [
    ['path', layer.path],
    ['pathrelative', layer.pathRelative],
  ];
  if (layer.velocityStart !== undefined) attrs.push(['velocitystart', floatString(layer.velocityStart)]);
  if (layer.velocityEnd !== undefined) attrs.push(['velocityend', floatString(layer.velocityEnd)]);
  return attrs;
}

function renderPad(pad: PadSpec, version: string, depth: number): string[] {
  const pad0 = INDENT.repeat(depth);
  const pad1 = INDENT.repeat(depth + 1);
  const pad2 = INDENT.repeat(depth + 2);

  return [
    pad0 +
      openTag('pad', [
        ['version', version],
        ['activemappings', String(pad.activeLayers)],
        ['colour', String(pad.colour)],
        ['name', pad.name],
        ['midikey', floatString(pad.midiKey)],
      ]),
    `${pad1}<mappings>`,
    ...pad.layers.map((layer) => pad2 + openTag('mapping', layerAttributes(layer), true)),
    `${pad1}</mappings>`,
    `${pad0}</pad>`,
  ];
}

/**
 * Renders a preset as TAL-Drum XML with two-space indentation.
 * The output has no trailing newline.
 */
export function renderPresetXml(doc: PresetDocument): string {
  const lines: string[] = [
    XML_DECLARATION,
    openTag('taldrum', [
      ['version', doc.version],
      ['path', doc.path],
      ['name', doc.name],
      ['volume', doc.volume],
      ['panelmode', doc.panelMode],
    ]),
  ];

  if (doc.pads.length === 0) {
    lines.push(`${INDENT}<pads />`);
  } else {
    lines.push(`${INDENT}<pads>`);
    for (const pad of doc.pads) {
      lines.push(...renderPad(pad, doc.version, 2));
    }
    lines.push(`${INDENT}</pads>`);
  }

  lines.push('</taldrum>');
  return lines.join('\n');
}
