import type {
  Box,
  BoxRecord,
  ByteSpan,
  Codestream,
  CodingStyleParameters,
  ColourMethod,
  Marker,
  MarkerFields,
  PacketHeader,
  PacketInfo,
  ParseTree,
  QuantizationParameters,
  SodFields
} from '../types.js';
import { bytesToHex, formatMarkerCode } from '../utils.js';
import { element, field, isXmlName, type XmlElement, type XmlValue } from './element.js';

export type BinaryEncoding = 'base64' | 'hex';

export interface XmlEncodeOptions {
  /** Encoding of opaque payloads (default: base64) */
  binaryEncoding?: BinaryEncoding;
  /** Emit offset/length attributes on every node (default: true) */
  includeSpans?: boolean;
  /** Default namespace declared on the root element */
  namespace?: string;
}

/**
 * Printable four-character codes are shown as text, anything else as hex
 */
function showFourCC(code: string): string {
  for (let i = 0; i < code.length; i++) {
    const c = code.charCodeAt(i);
    if (c < 0x20 || c > 0x7e) {
      let hex = '0x';
      for (let j = 0; j < code.length; j++) {
        hex += code.charCodeAt(j).toString(16).padStart(2, '0');
      }
      return hex;
    }
  }
  return code;
}

/**
 * Maps a parse tree onto ISO/IEC 15444-14 style elements: one element per
 * box or marker, named by its four-character code or mnemonic, with decoded
 * fields as children named by their ISO/IEC 15444-1 symbols.
 */
class XmlTreeEncoder {
  private readonly source: Uint8Array;
  private readonly encoding: BinaryEncoding;
  private readonly spans: boolean;

  constructor(source: Uint8Array, options: XmlEncodeOptions) {
    this.source = source;
    this.encoding = options.binaryEncoding ?? 'base64';
    this.spans = options.includeSpans ?? true;
  }

  node(name: string, span: ByteSpan, attributes: Record<string, XmlValue> = {}, children: XmlElement[] = []): XmlElement {
    const located = this.spans ? { ...attributes, offset: span.offset, length: span.length } : attributes;
    return element(name, located, children);
  }

  data(span: ByteSpan): XmlElement {
    const bytes = this.source.subarray(span.offset, span.offset + span.length);
    const text = this.encoding === 'hex'
      ? bytesToHex(bytes)
      : Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('base64');
    const attributes: Record<string, XmlValue> = { encoding: this.encoding };
    if (this.spans) {
      attributes.offset = span.offset;
      attributes.length = span.length;
    }
    return { ...element('data', attributes), text };
  }

  box(box: Box): XmlElement {
    const name = box.type.replace(/ /g, '_');
    const attributes: Record<string, XmlValue> = isXmlName(name) ? {} : { type: showFourCC(box.type) };
    if (box.lengthField !== 'explicit') {
      attributes.lengthField = box.lengthField;
    }

    let children: XmlElement[];
    switch (box.content.kind) {
      case 'superbox':
        children = box.content.children.map((child) => this.box(child));
        break;
      case 'codestream':
        children = this.codestream(box.content.codestream);
        break;
      case 'record':
        children = this.record(box.content.record);
        break;
      case 'opaque':
        children = [this.data(box.payloadSpan)];
        break;
    }
    return this.node(isXmlName(name) ? name : 'box', box.span, attributes, children);
  }

  record(record: BoxRecord): XmlElement[] {
    switch (record.box) {
      case 'jP  ':
        return [field('signature', `0x${record.signature.toString(16).padStart(8, '0')}`)];
      case 'ftyp':
        return [
          field('BR', showFourCC(record.brand)),
          field('MinV', record.minorVersion),
          ...record.compatibility.map((brand) => field('CL', showFourCC(brand)))
        ];
      case 'ihdr':
        return [
          field('HEIGHT', record.height),
          field('WIDTH', record.width),
          field('NC', record.components),
          record.depth
            ? field('BPC', record.bitsPerComponent, { bits: record.depth.bits, signed: record.depth.signed })
            : field('BPC', record.bitsPerComponent),
          field('C', record.compressionType),
          field('UnkC', record.colourspaceUnknown),
          field('IPR', record.intellectualProperty)
        ];
      case 'bpcc':
        return record.depths.map((depth) => field('BPC', depth.raw, { bits: depth.bits, signed: depth.signed }));
      case 'colr':
        return [
          field('METH', record.meth),
          field('PREC', record.precedence),
          field('APPROX', record.approximation),
          ...this.colour(record.colour)
        ];
      case 'pclr':
        return [
          field('NE', record.entryCount),
          field('NPC', record.columnCount),
          ...record.depths.map((depth) => field('B', depth.raw, { bits: depth.bits, signed: depth.signed })),
          ...record.entries.map((row, index) =>
            element('entry', { index }, row.map((value) => field('C', value)))
          )
        ];
      case 'cmap':
        return record.mappings.map((mapping) =>
          element('mapping', {}, [
            field('CMP', mapping.component),
            field('MTYP', mapping.mappingType),
            field('PCOL', mapping.paletteColumn)
          ])
        );
      case 'cdef':
        return [
          field('N', record.channels.length),
          ...record.channels.map((channel) =>
            element('channel', {}, [
              field('Cn', channel.channel),
              field('Typ', channel.type),
              field('Asoc', channel.association)
            ])
          )
        ];
      case 'resc':
      case 'resd': {
        const k = record.box === 'resc' ? 'c' : 'd';
        return [
          field(`VR${k}N`, record.verticalNumerator),
          field(`VR${k}D`, record.verticalDenominator),
          field(`HR${k}N`, record.horizontalNumerator),
          field(`HR${k}D`, record.horizontalDenominator),
          field(`VR${k}E`, record.verticalExponent),
          field(`HR${k}E`, record.horizontalExponent)
        ];
      }
      case 'xml ':
      case 'jp2i':
        return [field('text', record.text)];
      case 'uuid':
        return [field('ID', record.uuid), this.data(record.data)];
      case 'ulst':
        return [field('NU', record.ids.length), ...record.ids.map((id) => field('ID', id))];
      case 'url ':
        return [field('VERS', record.version), field('FLAG', record.flags), field('LOC', record.location)];
    }
  }

  colour(colour: ColourMethod): XmlElement[] {
    switch (colour.method) {
      case 'enumerated': {
        const enumCS = colour.name === undefined
          ? field('EnumCS', colour.enumCS)
          : field('EnumCS', colour.enumCS, { name: colour.name });
        return [enumCS, ...colour.parameters.map((value) => field('EP', value))];
      }
      case 'restricted-icc':
      case 'any-icc':
        return [element('PROFILE', {}, [this.data(colour.profile)])];
      case 'vendor':
        return [field('VCLR', colour.vendorCode), this.data(colour.parameters)];
      case 'parameterized':
        return [
          field('COLPRIMS', colour.colourPrimaries),
          field('TRANSFC', colour.transferCharacteristics),
          field('MATCOEFFS', colour.matrixCoefficients),
          field('VIDFRNG', colour.videoFullRange ? 1 : 0)
        ];
      case 'reserved':
        return [this.data(colour.data)];
    }
  }

  codestream(codestream: Codestream): XmlElement[] {
    const children = codestream.markers.map((marker) => this.marker(marker));
    if (codestream.trailing) {
      children.push(this.node('trailing', codestream.trailing, {}, [this.data(codestream.trailing)]));
    }
    return children;
  }

  marker(marker: Marker): XmlElement {
    const { fields } = marker;
    const children: XmlElement[] = [];
    if (marker.segmentLength !== undefined) {
      const lengthName = fields.type === 'unknown' ? 'L' : `L${fields.type.toLowerCase()}`;
      children.push(field(lengthName, marker.segmentLength));
    }
    children.push(...this.markerFields(fields));

    return fields.type === 'unknown'
      ? this.node('marker', marker.span, { code: formatMarkerCode(marker.code) }, children)
      : this.node(marker.name, marker.span, {}, children);
  }

  markerFields(fields: MarkerFields): XmlElement[] {
    switch (fields.type) {
      case 'SOC':
      case 'EOC':
        return [];
      case 'SIZ':
        return [
          field('Rsiz', fields.rsiz),
          field('Xsiz', fields.xsiz),
          field('Ysiz', fields.ysiz),
          field('XOsiz', fields.xOsiz),
          field('YOsiz', fields.yOsiz),
          field('XTsiz', fields.xTsiz),
          field('YTsiz', fields.yTsiz),
          field('XTOsiz', fields.xTOsiz),
          field('YTOsiz', fields.yTOsiz),
          field('Csiz', fields.csiz),
          ...fields.components.map((component, index) =>
            element('component', { index }, [
              field('Ssiz', component.ssiz, { precision: component.precision, signed: component.signed }),
              field('XRsiz', component.xRsiz),
              field('YRsiz', component.yRsiz)
            ])
          )
        ];
      case 'COD':
        return [
          field('Scod', fields.scod),
          element('SGcod', {}, [
            field('ProgressionOrder', fields.progressionOrder),
            field('Layers', fields.layers),
            field('MultipleComponentTransform', fields.multipleComponentTransform)
          ]),
          element('SPcod', {}, codingStyle(fields.parameters))
        ];
      case 'COC':
        return [
          field('Ccoc', fields.component),
          field('Scoc', fields.scoc),
          element('SPcoc', {}, codingStyle(fields.parameters))
        ];
      case 'QCD':
        return quantization('qcd', fields.quantization);
      case 'QCC':
        return [field('Cqcc', fields.component), ...quantization('qcc', fields.quantization)];
      case 'RGN':
        return [field('Crgn', fields.component), field('Srgn', fields.style), field('SPrgn', fields.shift)];
      case 'POC':
        return fields.changes.map((change) =>
          element('progression', {}, [
            field('RSpoc', change.resolutionStart),
            field('CSpoc', change.componentStart),
            field('LYEpoc', change.layerEnd),
            field('REpoc', change.resolutionEnd),
            field('CEpoc', change.componentEnd),
            field('Ppoc', change.progressionOrder)
          ])
        );
      case 'TLM':
        return [
          field('Ztlm', fields.index),
          field('Stlm', fields.stlm),
          ...fields.entries.map((entry) =>
            element('tile', {}, entry.tile === undefined
              ? [field('Ptlm', entry.length)]
              : [field('Ttlm', entry.tile), field('Ptlm', entry.length)])
          )
        ];
      case 'PLM':
        return [
          field('Zplm', fields.index),
          ...fields.runs.map((run) => element('run', {}, run.map((length) => field('Iplm', length))))
        ];
      case 'PLT':
        return [field('Zplt', fields.index), ...fields.packetLengths.map((length) => field('Iplt', length))];
      case 'PPM':
        return [field('Zppm', fields.index), this.data(fields.data)];
      case 'PPT':
        return [field('Zppt', fields.index), this.data(fields.data)];
      case 'CRG':
        return fields.offsets.map((offset) =>
          element('component', {}, [field('Xcrg', offset.x), field('Ycrg', offset.y)])
        );
      case 'COM':
        return [
          field('Rcom', fields.registration),
          fields.text === undefined ? element('Ccom', {}, [this.data(fields.data)]) : field('Ccom', fields.text)
        ];
      case 'SOT':
        return [
          field('Isot', fields.tileIndex),
          field('Psot', fields.tilePartLength),
          field('TPsot', fields.tilePartIndex),
          field('TNsot', fields.tilePartCount)
        ];
      case 'SOD':
        return [this.packets(fields)];
      case 'unknown':
        return fields.data ? [this.data(fields.data)] : [];
    }
  }

  packets(fields: SodFields): XmlElement {
    const children = fields.packets.length > 0
      ? fields.packets.map((packet) => this.packet(packet))
      : [this.data(fields.dataSpan)];
    return this.node('packets', fields.dataSpan, { source: fields.packetSource }, children);
  }

  packet(packet: PacketInfo): XmlElement {
    const attributes: Record<string, XmlValue> = { index: packet.index };
    if (packet.sequence !== undefined) attributes.Nsop = packet.sequence;
    if (packet.empty !== undefined) attributes.empty = packet.empty;

    const children: XmlElement[] = [];
    if (packet.headerSpan) {
      children.push(this.node('header', packet.headerSpan));
    }
    if (packet.header) {
      children.push(codeBlocks(packet.header));
    }
    children.push(this.data(packet.span));
    return this.node('packet', packet.span, attributes, children);
  }
}

function codeBlocks(header: PacketHeader): XmlElement {
  const attributes: Record<string, XmlValue> = {
    layer: header.layer,
    resolution: header.resolution,
    component: header.component,
    includedSubbands: header.includedSubbands,
    headerLength: header.headerLength,
    bodyLength: header.bodyLength
  };
  const children = header.codeBlocks.map((block) => {
    const blockAttributes: Record<string, XmlValue> = {
      subband: block.subband,
      x: block.x,
      y: block.y,
      included: block.included
    };
    if (block.zeroBitplanes !== undefined) blockAttributes.zeroBitplanes = block.zeroBitplanes;
    if (block.codingPasses !== undefined) blockAttributes.codingPasses = block.codingPasses;
    if (block.length !== undefined) blockAttributes.length = block.length;
    return element('codeBlock', blockAttributes);
  });
  return element('codeBlocks', attributes, children);
}

function codingStyle(parameters: CodingStyleParameters): XmlElement[] {
  const children = [
    field('DecompositionLevels', parameters.decompositionLevels),
    field('xcb', parameters.codeBlockWidthExponent),
    field('ycb', parameters.codeBlockHeightExponent),
    field('CodeBlockStyle', parameters.codeBlockStyle),
    field('Transformation', parameters.transformation)
  ];
  for (const precinct of parameters.precincts ?? []) {
    children.push(field('Precinct', precinct, { PPx: precinct & 0x0f, PPy: precinct >> 4 }));
  }
  return children;
}

function quantization(suffix: 'qcd' | 'qcc', parameters: QuantizationParameters): XmlElement[] {
  return [
    field(`S${suffix}`, parameters.sq, { guardBits: parameters.guardBits, style: parameters.style }),
    ...parameters.steps.map((step) =>
      step.mantissa === undefined
        ? field(`SP${suffix}`, step.raw, { exponent: step.exponent })
        : field(`SP${suffix}`, step.raw, { exponent: step.exponent, mantissa: step.mantissa })
    )
  ];
}

/**
 * Encode a parse tree as an XML element tree
 *
 * @param tree - Result of parseJp2, parseJpc or parseAuto
 * @param source - The buffer the tree was parsed from (opaque payloads are read through node spans)
 */
export function encodeTree(tree: ParseTree, source: Uint8Array, options: XmlEncodeOptions = {}): XmlElement {
  const encoder = new XmlTreeEncoder(source, options);
  const children = tree.format === 'jp2'
    ? tree.boxes.map((box) => encoder.box(box))
    : encoder.codestream(tree.codestream);
  const root = encoder.node(tree.format === 'jp2' ? 'jp2' : 'codestream', tree.span, {}, children);
  if (options.namespace !== undefined) {
    root.attributes = { xmlns: options.namespace, ...root.attributes };
  }
  return root;
}
