/**
 * JP2 box type codes (ISO/IEC 15444-1 Annex I)
 */
export const BoxType = {
  SIGNATURE: 'jP  ',
  FILE_TYPE: 'ftyp',
  JP2_HEADER: 'jp2h',
  IMAGE_HEADER: 'ihdr',
  BITS_PER_COMPONENT: 'bpcc',
  COLOUR_SPECIFICATION: 'colr',
  PALETTE: 'pclr',
  COMPONENT_MAPPING: 'cmap',
  CHANNEL_DEFINITION: 'cdef',
  RESOLUTION: 'res ',
  CAPTURE_RESOLUTION: 'resc',
  DISPLAY_RESOLUTION: 'resd',
  CONTIGUOUS_CODESTREAM: 'jp2c',
  INTELLECTUAL_PROPERTY: 'jp2i',
  XML: 'xml ',
  UUID: 'uuid',
  UUID_INFO: 'uinf',
  UUID_LIST: 'ulst',
  DATA_ENTRY_URL: 'url '
} as const;

export type KnownBoxType = typeof BoxType[keyof typeof BoxType];

/**
 * Boxes whose payload is itself a box sequence
 */
export const SUPERBOX_TYPES: ReadonlySet<string> = new Set([
  BoxType.JP2_HEADER,
  BoxType.RESOLUTION,
  BoxType.UUID_INFO
]);

/**
 * Brand every readable JP2 file lists in its compatibility list
 */
export const BRAND_JP2 = 'jp2 ';

export const COMPRESSION_TYPE_WAVELET = 7;

/**
 * Enumerated colourspaces (EnumCS) of ISO/IEC 15444-1 and 15444-2
 */
export const ENUMERATED_COLOURSPACES: ReadonlyMap<number, string> = new Map([
  [0, 'bilevel'],
  [1, 'YCbCr(1)'],
  [3, 'YCbCr(2)'],
  [4, 'YCbCr(3)'],
  [9, 'PhotoYCC'],
  [11, 'CMY'],
  [12, 'CMYK'],
  [13, 'YCCK'],
  [14, 'CIELab'],
  [15, 'bilevel(2)'],
  [16, 'sRGB'],
  [17, 'greyscale'],
  [18, 'sYCC'],
  [19, 'CIEJab'],
  [20, 'e-sRGB'],
  [21, 'ROMM-RGB'],
  [22, 'YPbPr(1125/60)'],
  [23, 'YPbPr(1250/50)'],
  [24, 'e-sYCC'],
  [25, 'scRGB'],
  [26, 'scRGB gray scale']
]);

export const ENUM_CS_CIELAB = 14;
export const ENUM_CS_CIEJAB = 19;
