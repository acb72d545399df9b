import type { CodingStyleParameters, SizFields, SubbandOrientation } from './types.js';

/** PPx and PPy when Scod/Scoc signal no precinct sizes */
const DEFAULT_PRECINCT_EXPONENT = 15;
/** Beyond this a precinct's tag trees are not worth building */
const MAX_CODE_BLOCKS = 1 << 20;

export const ProgressionOrder = {
  LRCP: 0,
  RLCP: 1,
  RPCL: 2,
  PCRL: 3,
  CPRL: 4
} as const;

export interface TileCodingStyle {
  readonly progressionOrder: number;
  readonly layers: number;
  /** Governing coding style of each component */
  readonly components: readonly CodingStyleParameters[];
}

export interface Bounds {
  readonly x0: number;
  readonly y0: number;
  readonly x1: number;
  readonly y1: number;
}

export interface SubbandLayout {
  readonly orientation: SubbandOrientation;
  readonly codeBlocksWide: number;
  readonly codeBlocksHigh: number;
}

/**
 * The precinct one packet belongs to, in the terms its header is coded in
 */
export interface PacketLayout {
  readonly layer: number;
  readonly resolution: number;
  readonly component: number;
  readonly codeBlockStyle: number;
  readonly subbands: readonly SubbandLayout[];
}

const ceilDiv = (value: number, exponent: number): number => Math.ceil(value / 2 ** exponent);
const floorDiv = (value: number, exponent: number): number => Math.floor(value / 2 ** exponent);

/**
 * Tile area on the reference grid (ISO/IEC 15444-1 B.3)
 */
export function tileBounds(siz: SizFields, tile: number): Bounds {
  const p = tile % siz.tilesX;
  const q = Math.floor(tile / siz.tilesX);
  return {
    x0: Math.max(siz.xTOsiz + p * siz.xTsiz, siz.xOsiz),
    y0: Math.max(siz.yTOsiz + q * siz.yTsiz, siz.yOsiz),
    x1: Math.min(siz.xTOsiz + (p + 1) * siz.xTsiz, siz.xsiz),
    y1: Math.min(siz.yTOsiz + (q + 1) * siz.yTsiz, siz.ysiz)
  };
}

/** Cells of a 2^exponent grid that the interval [lo, hi) touches */
function gridCount(lo: number, hi: number, exponent: number): number {
  return hi > lo ? ceilDiv(hi, exponent) - floorDiv(lo, exponent) : 0;
}

/**
 * Subbands of one resolution level of a tile-component (B.5), with their
 * code-block grids, or undefined unless the level is a single precinct.
 */
function resolutionLayout(
  component: Bounds,
  style: CodingStyleParameters,
  resolution: number
): SubbandLayout[] | undefined {
  const levels = style.decompositionLevels;
  const shift = levels - resolution;
  const rx0 = ceilDiv(component.x0, shift);
  const ry0 = ceilDiv(component.y0, shift);
  const rx1 = ceilDiv(component.x1, shift);
  const ry1 = ceilDiv(component.y1, shift);

  const precinct = style.precincts?.[resolution];
  const ppx = precinct === undefined ? DEFAULT_PRECINCT_EXPONENT : precinct & 0x0f;
  const ppy = precinct === undefined ? DEFAULT_PRECINCT_EXPONENT : precinct >> 4;
  if (gridCount(rx0, rx1, ppx) * gridCount(ry0, ry1, ppy) !== 1) {
    return undefined;
  }

  const xcb = Math.min(style.codeBlockWidthExponent + 2, resolution > 0 ? ppx - 1 : ppx);
  const ycb = Math.min(style.codeBlockHeightExponent + 2, resolution > 0 ? ppy - 1 : ppy);
  if (xcb < 0 || ycb < 0) {
    return undefined;
  }

  const bands: [SubbandOrientation, number, number][] =
    resolution === 0 ? [['LL', 0, 0]] : [['HL', 1, 0], ['LH', 0, 1], ['HH', 1, 1]];
  const nb = resolution === 0 ? levels : levels - resolution + 1;

  return bands.map(([orientation, xob, yob]) => {
    const xOffset = xob === 1 ? 2 ** (nb - 1) : 0;
    const yOffset = yob === 1 ? 2 ** (nb - 1) : 0;
    const bx0 = ceilDiv(component.x0 - xOffset, nb);
    const by0 = ceilDiv(component.y0 - yOffset, nb);
    const bx1 = ceilDiv(component.x1 - xOffset, nb);
    const by1 = ceilDiv(component.y1 - yOffset, nb);
    return {
      orientation,
      codeBlocksWide: gridCount(bx0, bx1, xcb),
      codeBlocksHigh: gridCount(by0, by1, ycb)
    };
  });
}

type Axis = 'layer' | 'resolution' | 'component';

/** Loop nesting of each progression order, outermost first */
const NESTING: Record<number, readonly [Axis, Axis, Axis]> = {
  [ProgressionOrder.LRCP]: ['layer', 'resolution', 'component'],
  [ProgressionOrder.RLCP]: ['resolution', 'layer', 'component'],
  [ProgressionOrder.RPCL]: ['resolution', 'component', 'layer'],
  [ProgressionOrder.PCRL]: ['component', 'resolution', 'layer'],
  [ProgressionOrder.CPRL]: ['component', 'resolution', 'layer']
};

function* progression(
  order: number,
  layers: number,
  resolutions: SubbandLayout[][][],
  styles: readonly CodingStyleParameters[]
): Generator<PacketLayout> {
  const [outer, middle, inner] = NESTING[order] ?? NESTING[ProgressionOrder.LRCP];
  const extent: Record<Axis, number> = {
    layer: layers,
    resolution: Math.max(...resolutions.map((levels) => levels.length)),
    component: resolutions.length
  };
  const at: Record<Axis, number> = { layer: 0, resolution: 0, component: 0 };

  for (at[outer] = 0; at[outer] < extent[outer]; at[outer]++) {
    for (at[middle] = 0; at[middle] < extent[middle]; at[middle]++) {
      for (at[inner] = 0; at[inner] < extent[inner]; at[inner]++) {
        const { layer, resolution, component } = at;
        // components with fewer decomposition levels skip the higher resolutions
        if (resolution >= resolutions[component].length) continue;
        yield {
          layer,
          resolution,
          component,
          codeBlockStyle: styles[component].codeBlockStyle,
          subbands: resolutions[component][resolution]
        };
      }
    }
  }
}

/**
 * Packets of a tile in progression order (B.12), when every resolution level
 * of every tile-component is a single precinct. The position-driven orders
 * (RPCL, PCRL, CPRL) are only followed for a tile at the grid origin, where
 * every precinct is reached at the first position.
 */
export function packetLayouts(
  siz: SizFields,
  tile: number,
  style: TileCodingStyle
): Generator<PacketLayout> | undefined {
  const bounds = tileBounds(siz, tile);
  const positional = style.progressionOrder > ProgressionOrder.RLCP;
  if (positional && (bounds.x0 !== 0 || bounds.y0 !== 0)) {
    return undefined;
  }

  const resolutions: SubbandLayout[][][] = [];
  let codeBlocks = 0;
  for (let c = 0; c < siz.csiz; c++) {
    const { xRsiz, yRsiz } = siz.components[c];
    const component: Bounds = {
      x0: Math.ceil(bounds.x0 / xRsiz),
      y0: Math.ceil(bounds.y0 / yRsiz),
      x1: Math.ceil(bounds.x1 / xRsiz),
      y1: Math.ceil(bounds.y1 / yRsiz)
    };
    const levels: SubbandLayout[][] = [];
    for (let r = 0; r <= style.components[c].decompositionLevels; r++) {
      const subbands = resolutionLayout(component, style.components[c], r);
      if (!subbands) return undefined;
      for (const band of subbands) {
        codeBlocks = Math.max(codeBlocks, band.codeBlocksWide * band.codeBlocksHigh);
      }
      levels.push(subbands);
    }
    resolutions.push(levels);
  }
  if (codeBlocks > MAX_CODE_BLOCKS) {
    return undefined;
  }

  return progression(style.progressionOrder, style.layers, resolutions, style.components);
}
