import { describe, it, expect } from 'vitest';
import { buildLayers, buildPreset } from '../preset-builder';
import { escapeAttribute, floatString, renderPresetXml } from '../xml-renderer';
import { createSeededRandom } from '../colour';
import { PathEscapeError } from '../../errors';
import type { RandomSource } from '../colour';
import type { PresetBuildOptions } from '../types';

// Channels (230, 25, 128): vivid on the first draw
function fixedColour(): RandomSource {
  const values = [0.9, 0.1, 0.5];
  let i = 0;
  return () => values[i++ % values.length];
}

const OPTIONS: PresetBuildOptions = {
  presetPath: '/out/Demo.taldrum',
  name: 'Demo',
  libraryRoot: '/lib',
  padBaseNote: 36,
  padCount: 4,
};

const files = (n: number): string[] => Array.from({ length: n }, (_, i) => `/lib/Kick ${i + 1}.wav`);

describe('buildLayers', () => {
  it('leaves both bounds implicit for a single layer', () => {
    const layers = buildLayers(['/lib/Kick 1.wav'], '/out', '/lib');
    expect(layers[0]).toEqual({ path: '../lib/Kick 1.wav', pathRelative: 'Kick 1.wav' });
    expect(layers).toHaveLength(8);
  });

  it('omits the first start and last end bound', () => {
    const layers = buildLayers(files(3), '/out', '/lib');
    expect(layers.slice(0, 3)).toEqual([
      { path: '../lib/Kick 1.wav', pathRelative: 'Kick 1.wav', velocityEnd: 42 },
      { path: '../lib/Kick 2.wav', pathRelative: 'Kick 2.wav', velocityStart: 43, velocityEnd: 84 },
      { path: '../lib/Kick 3.wav', pathRelative: 'Kick 3.wav', velocityStart: 85 },
    ]);
    expect(layers[3]).toEqual({ path: '', pathRelative: '' });
  });

  it('uses at most 8 samples', () => {
    const layers = buildLayers(files(10), '/out', '/lib');
    expect(layers).toHaveLength(8);
    expect(layers[7]).toEqual({ path: '../lib/Kick 8.wav', pathRelative: 'Kick 8.wav', velocityStart: 112 });
  });
});

describe('buildPreset', () => {
  it('binds pad i to base + i and fills assigned pads', () => {
    const notes = new Map([[36, files(2)]]);
    const doc = buildPreset(notes, OPTIONS, fixedColour());

    expect(doc.pads.map((p) => [p.name, p.midiKey])).toEqual([
      ['Pad 1', 36],
      ['Pad 2', 37],
      ['Pad 3', 38],
      ['Pad 4', 39],
    ]);
    expect(doc.pads[0].activeLayers).toBe(2);
    expect(doc.pads[0].colour).toBe(-1697408);
    expect(doc.pads[0].layers.slice(0, 2)).toEqual([
      { path: '../lib/Kick 1.wav', pathRelative: 'Kick 1.wav', velocityEnd: 63 },
      { path: '../lib/Kick 2.wav', pathRelative: 'Kick 2.wav', velocityStart: 64 },
    ]);
    expect(doc.pads[1]).toMatchObject({ activeLayers: 0, colour: 0 });
  });

  it('skips notes outside the grid', () => {
    const doc = buildPreset(new Map([[100, files(1)]]), OPTIONS, fixedColour());
    expect(doc.pads.every((p) => p.activeLayers === 0)).toBe(true);
  });

  it('caps a pad at 8 active layers', () => {
    const doc = buildPreset(new Map([[37, files(12)]]), OPTIONS, fixedColour());
    expect(doc.pads[1].activeLayers).toBe(8);
  });

  it('gives pads their own layer objects', () => {
    const doc = buildPreset(new Map(), OPTIONS);
    expect(doc.pads[0].layers[0]).not.toBe(doc.pads[1].layers[0]);
  });

  it('throws PathEscapeError for samples outside the library root', () => {
    expect(() => buildPreset(new Map([[36, ['/elsewhere/Kick.wav']]]), OPTIONS, fixedColour())).toThrow(
      PathEscapeError
    );
  });
});

describe('renderPresetXml', () => {
  it('renders the TAL-Drum document', () => {
    const doc = buildPreset(new Map([[36, files(2)]]), { ...OPTIONS, padCount: 2 }, fixedColour());
    const empty = '        <mapping path="" pathrelative="" />';

    expect(renderPresetXml(doc)).toBe(
      [
        "<?xml version='1.0' encoding='utf-8'?>",
        '<taldrum version="13" path="/out/Demo.taldrum" name="Demo" volume="0.75" panelmode="0">',
        '  <pads>',
        '    <pad version="13" activemappings="2" colour="-1697408" name="Pad 1" midikey="36.0">',
        '      <mappings>',
        '        <mapping path="../lib/Kick 1.wav" pathrelative="Kick 1.wav" velocityend="63.0" />',
        '        <mapping path="../lib/Kick 2.wav" pathrelative="Kick 2.wav" velocitystart="64.0" />',
        ...Array.from({ length: 6 }, () => empty),
        '      </mappings>',
        '    </pad>',
        '    <pad version="13" activemappings="0" colour="0" name="Pad 2" midikey="37.0">',
        '      <mappings>',
        ...Array.from({ length: 8 }, () => empty),
        '      </mappings>',
        '    </pad>',
        '  </pads>',
        '</taldrum>',
      ].join('\n')
    );
  });

  it('is byte-identical across runs with the same seed', () => {
    const notes = new Map([
      [36, files(3)],
      [38, files(1)],
      [90, files(2)],
    ]);
    const render = () => renderPresetXml(buildPreset(notes, { ...OPTIONS, padCount: 64 }, createSeededRandom(7)));
    expect(render()).toBe(render());
  });

  it('escapes attribute values', () => {
    expect(escapeAttribute('a & "b" <c>\n')).toBe('a &amp; &quot;b&quot; &lt;c&gt;&#10;');
    const doc = buildPreset(new Map(), { ...OPTIONS, name: 'Rock & Roll', padCount: 0 });
    expect(renderPresetXml(doc).split('\n')[1]).toBe(
      '<taldrum version="13" path="/out/Demo.taldrum" name="Rock &amp; Roll" volume="0.75" panelmode="0">'
    );
  });
});

describe('floatString', () => {
  it('writes integers with one decimal', () => {
    expect(floatString(36)).toBe('36.0');
    expect(floatString(127)).toBe('127.0');
  });
});
