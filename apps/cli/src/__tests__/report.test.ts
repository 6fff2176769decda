import { describe, it, expect } from 'vitest';
import { formatGenerateTally, formatListing, formatRejected } from '../report';
import { PathEscapeError } from '@kitsmith/core';
import type { KitCollection, RejectedKit } from '@kitsmith/core';

describe('formatListing', () => {
  it('lists kits, categories and file names', () => {
    const kits: KitCollection = new Map([
      ['808', new Map([['kick', ['/lib/Kick 808 1.wav', '/lib/Kick 808 2.wav']], ['other', ['/lib/808 Fx.wav']]])],
    ]);
    expect(formatListing(kits)).toEqual([
      'TOTAL KITS : 1',
      '',
      '=== KIT : 808 ===',
      '  Total samples : 3',
      '  kick (2)',
      '    - Kick 808 1.wav',
      '    - Kick 808 2.wav',
      '  other (1)',
      '    - 808 Fx.wav',
    ]);
  });
});

describe('formatRejected', () => {
  it('shows the reason and the numbers behind it', () => {
    const rejected = new Map<string, RejectedKit>([
      [
        'Big',
        {
          status: 'rejected',
          kitName: 'Big',
          reason: 'trash_zone_insufficient',
          details: { overflow: [{ category: 'kick', count: 10, capacity: 8 }], otherCount: 3, trashNeeded: 5, trashCapacity: 0 },
          elements: new Map(),
        },
      ],
      ['Tiny', { status: 'rejected', kitName: 'Tiny', reason: 'too_few_samples', details: {}, elements: new Map() }],
    ]);
    expect(formatRejected(rejected)).toEqual([
      '  - Big: trash_zone_insufficient, trash needed 5, capacity 0, kick 10/8, other 3',
      '  - Tiny: too_few_samples',
    ]);
  });
});

describe('formatGenerateTally', () => {
  it('lists warnings and failures', () => {
    const lines = formatGenerateTally({
      outputDir: '/out',
      written: [
        { kitName: 'Clean', presetPath: '/out/Clean.taldrum', warnings: [] },
        {
          kitName: 'Big',
          presetPath: '/out/Big.taldrum',
          warnings: [{ kind: 'truncated', category: 'kick', dropped: 2, message: 'Overflow in kick, truncated 2' }],
        },
      ],
      failed: [{ kitName: 'Broken', error: new PathEscapeError('/x/a.wav', '/lib') }],
    });
    expect(lines).toEqual([
      'PRESETS WRITTEN : 2',
      '  Big:',
      '    ! Overflow in kick, truncated 2',
      'PRESETS FAILED : 1',
      '  - Broken: Sample outside global base path: /x/a.wav (base=/lib)',
      'Generation complete → /out',
    ]);
  });
});
