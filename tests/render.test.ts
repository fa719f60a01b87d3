import { describe, it, expect } from 'vitest';
import { formatAlert, renderTree } from '../src/cli/render.js';
import type { AggregationTree } from '../src/classification/types.js';
import type { Alert } from '../src/brokers/adapter.js';

describe('renderTree', () => {
  it('indents children under their parent, heaviest first', () => {
    const tree: AggregationTree = {
      root: '~Root',
      nodes: [
        { label: 'SNII', parent: 'Supernova', weight: 0.5, mapped: true },
        { label: 'Supernova', parent: '~Root', weight: 0.5, mapped: true },
        { label: '~Root', parent: '', weight: 1.2, mapped: true },
        { label: 'mystery', parent: '~Root', weight: 0.7, mapped: false },
      ],
      unmapped: ['mystery'],
    };

    expect(renderTree(tree).map((l) => l.text)).toEqual([
      '~Root 1.20',
      '  mystery 0.70 (unmapped)',
      '  Supernova 0.50',
      '    SNII 0.50',
    ]);
  });

  it('breaks weight ties by label', () => {
    const tree: AggregationTree = {
      root: '~Root',
      nodes: [
        { label: '~Root', parent: '', weight: 0.6, mapped: true },
        { label: 'Pulsating', parent: '~Root', weight: 0.3, mapped: true },
        { label: 'AGN', parent: '~Root', weight: 0.3, mapped: true },
      ],
      unmapped: [],
    };

    expect(renderTree(tree).map((l) => l.text)).toEqual(['~Root 0.60', '  AGN 0.30', '  Pulsating 0.30']);
  });

  it('renders nothing for an empty tree', () => {
    expect(renderTree({ root: '~Root', nodes: [], unmapped: [] })).toEqual([]);
  });
});

describe('formatAlert', () => {
  const alert: Alert = {
    broker: 'Lasair',
    sourceId: 'ZTF21abcdefg',
    displayUrl: 'https://lasair-ztf.lsst.ac.uk/objects/ZTF21abcdefg/',
    name: 'ZTF21abcdefg',
    ra: 150.25,
    dec: -12.5,
    detectionTime: 60100.25,
    magnitude: 18.25,
    score: 1,
  };

  it('prints position, time and magnitude', () => {
    expect(formatAlert(alert)).toBe(
      'ZTF21abcdefg    ra=150.25000  dec=-12.50000  mjd=60100.2500  mag=18.25  https://lasair-ztf.lsst.ac.uk/objects/ZTF21abcdefg/',
    );
  });

  it('prints dashes for an unknown magnitude', () => {
    expect(formatAlert({ ...alert, magnitude: -999 })).toContain('mag=   --  ');
  });
});
