/*
 * Dense runs of fixed-width unsigned fields inside 64-bit words. Field `i`
 * starts at bit `i * bits`, counted from the least significant bit of word 0,
 * and may continue into the low bits of the following word. Words hold the
 * signed 64-bit values found on disk.
 */

const WORD_BITS = 64;
const WORD_MASK = (1n << 64n) - 1n;
const MAX_FIELD_BITS = 32;

/** Smallest width of at least 2 bits that can index `paletteSize` entries. */
export function requiredBits(paletteSize: number): number {
  if (!Number.isInteger(paletteSize) || paletteSize < 0 || paletteSize > 2 ** 32) {
    throw new RangeError(`Palette size ${paletteSize} is outside [0, 2^32]`);
  }
  if (paletteSize <= 2) return 2;
  return Math.max(2, 32 - Math.clz32(paletteSize - 1));
}

export function requiredWordCount(fieldCount: number, bits: number): number {
  return Math.ceil((fieldCount * bits) / WORD_BITS);
}

/** How many whole fields fit in `wordCount` words. */
export function fieldCapacity(wordCount: number, bits: number): number {
  return Math.floor((wordCount * WORD_BITS) / bits);
}

function checkBits(bits: number): void {
  if (!Number.isInteger(bits) || bits < 1 || bits > MAX_FIELD_BITS) {
    throw new RangeError(`Field width ${bits} is outside [1, ${MAX_FIELD_BITS}]`);
  }
}

function unsignedWord(words: readonly bigint[], index: number): bigint | undefined {
  const word = words[index];
  return word === undefined ? undefined : BigInt.asUintN(64, word);
}

function locate(words: readonly bigint[], index: number, bits: number): { word: number; shift: bigint; low: bigint } {
  checkBits(bits);
  const offset = index * bits;
  const word = Math.floor(offset / WORD_BITS);
  const low = Number.isInteger(index) && index >= 0 ? unsignedWord(words, word) : undefined;
  if (low === undefined) {
    throw new RangeError(`Field ${index} of ${bits} bits starts outside ${words.length} words`);
  }
  return { word, shift: BigInt(offset % WORD_BITS), low };
}

export function getField(words: readonly bigint[], index: number, bits: number): number {
  const { word, shift, low } = locate(words, index, bits);
  const high = unsignedWord(words, word + 1) ?? 0n;
  const window = low | (high << 64n);
  return Number((window >> shift) & ((1n << BigInt(bits)) - 1n));
}

export function setField(words: bigint[], index: number, bits: number, value: number): void {
  const { word, shift, low } = locate(words, index, bits);
  if (!Number.isInteger(value) || value < 0 || value >= 2 ** bits) {
    throw new RangeError(`Value ${value} does not fit in ${bits} bits`);
  }
  const span = ((1n << BigInt(bits)) - 1n) << shift;
  const shifted = BigInt(value) << shift;

  words[word] = BigInt.asIntN(64, (low & ~(span & WORD_MASK)) | (shifted & WORD_MASK));

  const highSpan = span >> 64n;
  if (highSpan === 0n) return;
  const high = unsignedWord(words, word + 1);
  if (high === undefined) {
    if (shifted >> 64n !== 0n) {
      throw new RangeError(`Field ${index} of ${bits} bits runs past ${words.length} words`);
    }
    return;
  }
  words[word + 1] = BigInt.asIntN(64, (high & ~highSpan) | (shifted >> 64n));
}
