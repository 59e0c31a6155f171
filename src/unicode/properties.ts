/**
 * Grapheme_Cluster_Break values. Index 0 is the default.
 */
export const GCB_PROPERTY_NAMES = [
  "Other",
  "CR",
  "LF",
  "Control",
  "Extend",
  "ZWJ",
  "Regional_Indicator",
  "Prepend",
  "SpacingMark",
  "L",
  "V",
  "T",
  "LV",
  "LVT",
] as const;

export type GraphemeClusterBreak = (typeof GCB_PROPERTY_NAMES)[number];

/**
 * Indic_Conjunct_Break values. Index 0 is the default.
 */
export const INCB_PROPERTY_NAMES = ["None", "Consonant", "Extend", "Linker"] as const;

export type IndicConjunctBreak = (typeof INCB_PROPERTY_NAMES)[number];

/**
 * East_Asian_Width values. Index 0 is the default.
 */
export const EAW_PROPERTY_NAMES = ["N", "A", "F", "H", "Na", "W"] as const;

export type EastAsianWidth = (typeof EAW_PROPERTY_NAMES)[number];

/**
 * General_Category values. Index 0 (Cn, unassigned) is the default.
 */
export const GC_PROPERTY_NAMES = [
  "Cn",
  "Lu",
  "Ll",
  "Lt",
  "Lm",
  "Lo",
  "Mn",
  "Mc",
  "Me",
  "Nd",
  "Nl",
  "No",
  "Pc",
  "Pd",
  "Ps",
  "Pe",
  "Pi",
  "Pf",
  "Po",
  "Sm",
  "Sc",
  "Sk",
  "So",
  "Zs",
  "Zl",
  "Zp",
  "Cc",
  "Cf",
  "Cs",
  "Co",
] as const;

export type GeneralCategory = (typeof GC_PROPERTY_NAMES)[number];

/**
 * Values of every property the segmenter and the width calculator read.
 */
export interface PropertyValueMap {
  Grapheme_Cluster_Break: GraphemeClusterBreak;
  Extended_Pictographic: boolean;
  Emoji: boolean;
  Emoji_Presentation: boolean;
  Indic_Conjunct_Break: IndicConjunctBreak;
  Canonical_Combining_Class: number;
  Indic_Syllabic_Category: string;
  Script: string;
  East_Asian_Width: EastAsianWidth;
  General_Category: GeneralCategory;
}

export type PropertyName = keyof PropertyValueMap;

export type PropertyValue = PropertyValueMap[PropertyName];

export const PROPERTY_NAMES: readonly PropertyName[] = [
  "Grapheme_Cluster_Break",
  "Extended_Pictographic",
  "Emoji",
  "Emoji_Presentation",
  "Indic_Conjunct_Break",
  "Canonical_Combining_Class",
  "Indic_Syllabic_Category",
  "Script",
  "East_Asian_Width",
  "General_Category",
];

/**
 * Binary emoji properties, all read from emoji-data.txt.
 */
export const EMOJI_PROPERTY_NAMES = [
  "Emoji",
  "Emoji_Presentation",
  "Extended_Pictographic",
] as const satisfies readonly PropertyName[];

export type EmojiPropertyName = (typeof EMOJI_PROPERTY_NAMES)[number];

export const CodePoints = {
  NUL: 0x0000,
  SOFT_HYPHEN: 0x00ad,
  HANGUL_JUNGSEONG_FILLER: 0x1160,
  HANGUL_JONGSEONG_SSANGNIEUN: 0x11ff,
  ZERO_WIDTH_JOINER: 0x200d,
  TEXT_VARIATION_SELECTOR: 0xfe0e,
  EMOJI_VARIATION_SELECTOR: 0xfe0f,
} as const;
