export const formatAmount = (value: number, fractionDigits = 2): string =>
  value.toLocaleString(['en-US'], {
    minimumFractionDigits: fractionDigits,
    maximumFractionDigits: fractionDigits,
    useGrouping: false,
  });

export const formatCurrency = (value: number, fractionDigits = 2): string =>
  `$${formatAmount(value, fractionDigits)}`;
