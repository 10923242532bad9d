const ARABIC_LETTER = /(?=\p{Script=Arabic})\p{L}/u;

// Formes de présentation A et B (ligatures, formes contextuelles)
const PRESENTATION_FORMS = /[\uFB50-\uFDFF\uFE70-\uFEFC]+/g;
const LAM_ALEF_LIGATURES = /[\uFEFB\uFEFC]/g;
const HEH_DOACHASHMEE = /\u06BE/g;
const TATWEEL = /\u0640/g;
const ARABIC_INDIC_DIGITS = /[\u0660-\u0669]/g;
const EASTERN_ARABIC_INDIC_DIGITS = /[\u06F0-\u06F9]/g;

export function isArabicText(text: string): boolean {
  return ARABIC_LETTER.test(text);
}

function westernDigit(zero: number) {
  return (digit: string): string => String(digit.charCodeAt(0) - zero);
}

/**
 * Corrige les artefacts courants des couches texte arabes : ligatures,
 * formes de présentation, kashida et chiffres indo-arabes.
 */
export function normalizeArabic(text: string): string {
  if (!isArabicText(text)) {
    return text;
  }
  return text
    .replace(LAM_ALEF_LIGATURES, '\u0644\u0627')
    .replace(PRESENTATION_FORMS, (forms) => forms.normalize('NFKC'))
    .replace(HEH_DOACHASHMEE, '\u0647')
    .replace(TATWEEL, '')
    .replace(ARABIC_INDIC_DIGITS, westernDigit(0x0660))
    .replace(EASTERN_ARABIC_INDIC_DIGITS, westernDigit(0x06f0));
}
