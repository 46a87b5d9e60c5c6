/**
 * Format a number to at most 4 significant figures, using k/M/B suffixes instead of scientific notation
 */
export function formatSigFigs(value: number, maxSigFigs: number = 4): string {
  if (value === 0) return "0";
  if (!isFinite(value)) return String(value);

  const sigFigs = Math.max(1, maxSigFigs);

  const absValue = Math.abs(value);
  const sign = value < 0 ? '-' : '';

  if (absValue >= 1_000_000_000) {
    return sign + formatWithSigFigs(absValue / 1_000_000_000, sigFigs) + 'B';
  } else if (absValue >= 1_000_000) {
    return sign + formatWithSigFigs(absValue / 1_000_000, sigFigs) + 'M';
  } else if (absValue >= 10_000) {
    return sign + formatWithSigFigs(absValue / 1_000, sigFigs) + 'k';
  } else if (absValue < 0.0001) {
    // Very small numbers - decimal notation, no exponent
    return value.toFixed(4);
  }

  return sign + formatWithSigFigs(absValue, sigFigs);
}

function formatWithSigFigs(value: number, sigFigs: number): string {
  let formatted = value.toPrecision(sigFigs);

  // toPrecision switches to exponent form once the integer part has more digits than sigFigs
  if (formatted.includes('e') || formatted.includes('E')) {
    const num = parseFloat(formatted);
    const decimals = Math.max(0, sigFigs - Math.floor(Math.log10(Math.abs(num))) - 1);
    formatted = num.toFixed(Math.min(decimals, 4));
  }

  // Only trailing zeros after a decimal point are padding
  return formatted.includes('.') ? formatted.replace(/\.?0+$/, "") : formatted;
}
