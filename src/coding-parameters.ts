import { inconsistency } from './errors.js';
import type { TileCodingStyle } from './tile-geometry.js';
import type {
  CocFields,
  CodFields,
  CodingStyleParameters,
  QccFields,
  QcdFields,
  RgnFields,
  SizFields
} from './types.js';

interface Located<T> {
  readonly offset: number;
  readonly fields: T;
}

/**
 * Coding style and quantization markers seen in one header (the main header,
 * or all tile-part headers of one tile)
 */
interface HeaderParameters {
  cod?: Located<CodFields>;
  qcd?: Located<QcdFields>;
  coc: Map<number, Located<CocFields>>;
  qcc: Map<number, Located<QccFields>>;
  rgn: Map<number, number>;
}

export type HeaderMarker = CodFields | CocFields | QcdFields | QccFields | RgnFields;

function emptyHeader(): HeaderParameters {
  return { coc: new Map(), qcc: new Map(), rgn: new Map() };
}

/**
 * Number of quantization step sizes a component needs.
 * Scalar derived signals only the LL band; the others one per subband.
 */
export function expectedStepCount(style: number, decompositionLevels: number): number {
  return style === 1 ? 1 : 3 * decompositionLevels + 1;
}

/**
 * Accumulates the parameters that later markers are validated against.
 *
 * Owned by a single codestream parse and thrown away with it. Precedence for
 * a component follows ISO/IEC 15444-1 A.6: tile COC, tile COD, main COC, main
 * COD for the coding style; tile QCC, tile QCD, main QCC, main QCD for
 * quantization.
 */
export class CodingParameters {
  readonly siz: SizFields;
  private readonly main: HeaderParameters = emptyHeader();
  private readonly tiles = new Map<number, HeaderParameters>();

  constructor(siz: SizFields) {
    this.siz = siz;
  }

  get tileCount(): number {
    return this.siz.tilesX * this.siz.tilesY;
  }

  get hasMainCod(): boolean {
    return this.main.cod !== undefined;
  }

  get hasMainQcd(): boolean {
    return this.main.qcd !== undefined;
  }

  /**
   * Record a coding style, quantization or region marker.
   * `tile` is undefined for the main header.
   */
  record(fields: HeaderMarker, offset: number, tile?: number): void {
    const header = this.header(tile);
    switch (fields.type) {
      case 'COD':
        if (header.cod) {
          throw duplicate('COD', offset, header.cod.offset);
        }
        header.cod = { offset, fields };
        break;
      case 'QCD':
        if (header.qcd) {
          throw duplicate('QCD', offset, header.qcd.offset);
        }
        header.qcd = { offset, fields };
        break;
      case 'COC': {
        const previous = header.coc.get(fields.component);
        if (previous) {
          throw duplicate('COC', offset, previous.offset, fields.component);
        }
        header.coc.set(fields.component, { offset, fields });
        break;
      }
      case 'QCC': {
        const previous = header.qcc.get(fields.component);
        if (previous) {
          throw duplicate('QCC', offset, previous.offset, fields.component);
        }
        header.qcc.set(fields.component, { offset, fields });
        break;
      }
      case 'RGN': {
        const previous = header.rgn.get(fields.component);
        if (previous !== undefined) {
          throw duplicate('RGN', offset, previous, fields.component);
        }
        header.rgn.set(fields.component, offset);
        break;
      }
    }
  }

  /**
   * Coding style governing a component, if any COD/COC applies
   */
  codingStyle(component: number, tile?: number): CodingStyleParameters | undefined {
    const local = tile === undefined ? undefined : this.tiles.get(tile);
    return (
      local?.coc.get(component)?.fields.parameters ??
      local?.cod?.fields.parameters ??
      this.main.coc.get(component)?.fields.parameters ??
      this.main.cod?.fields.parameters
    );
  }

  decompositionLevels(component: number, tile?: number): number | undefined {
    return this.codingStyle(component, tile)?.decompositionLevels;
  }

  /**
   * Progression, layers and per-component coding style in force for a tile
   */
  tileCodingStyle(tile: number): TileCodingStyle | undefined {
    const cod = this.tiles.get(tile)?.cod ?? this.main.cod;
    if (!cod) return undefined;
    const components: CodingStyleParameters[] = [];
    for (let component = 0; component < this.siz.csiz; component++) {
      const style = this.codingStyle(component, tile);
      if (!style) return undefined;
      components.push(style);
    }
    return { progressionOrder: cod.fields.progressionOrder, layers: cod.fields.layers, components };
  }

  /**
   * Check every component's step count against its decomposition levels.
   * Components without a governing COD or QCD are skipped.
   */
  validateQuantization(tile?: number): void {
    const local = tile === undefined ? undefined : this.tiles.get(tile);
    for (let component = 0; component < this.siz.csiz; component++) {
      const levels = this.decompositionLevels(component, tile);
      const quantization =
        local?.qcc.get(component) ??
        local?.qcd ??
        this.main.qcc.get(component) ??
        this.main.qcd;
      if (levels === undefined || quantization === undefined) continue;

      const { style, steps } = quantization.fields.quantization;
      const expected = expectedStepCount(style, levels);
      if (steps.length !== expected) {
        const where = tile === undefined ? 'main header' : `tile ${tile}`;
        throw inconsistency(
          `${quantization.fields.type} signals ${steps.length} step size(s) but component ${component} in ${where} ` +
            `has ${levels} decomposition level(s) and quantization style ${style}, needing ${expected}`,
          quantization.offset,
          quantization.fields.type
        );
      }
    }
  }

  private header(tile?: number): HeaderParameters {
    if (tile === undefined) return this.main;
    let header = this.tiles.get(tile);
    if (!header) {
      header = emptyHeader();
      this.tiles.set(tile, header);
    }
    return header;
  }
}

function duplicate(name: string, offset: number, previous: number, component?: number): Error {
  const which = component === undefined ? '' : ` for component ${component}`;
  return inconsistency(`duplicate ${name}${which} in one header, first seen at offset ${previous}`, offset, name);
}
