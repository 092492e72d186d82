const brl = new Intl.NumberFormat("pt-BR", {
  style: "currency",
  currency: "BRL",
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

const MONTH_LABELS = ["Jan", "Fev", "Mar", "Abr", "Mai", "Jun", "Jul", "Ago", "Set", "Out", "Nov", "Dez"];

/**
 * Formats an amount as Brazilian reais, e.g. "R$ 1.200,00".
 * Intl separates the symbol with a no-break space; it is normalized to a
 * plain space so console tables line up.
 */
export function formatBRL(value: number): string {
  return brl.format(value).replace(/\u00a0/g, " ");
}

/**
 * Short month label, e.g. "Jan/2025".
 */
export function formatMonthLabel(year: number, month: number): string {
  return `${MONTH_LABELS[month - 1]}/${year}`;
}
