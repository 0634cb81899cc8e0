// src/utils/filters.ts

/**
 * Janela em dias vinda de texto (query string, flag de CLI).
 * Vazio usa o padrão, "all" significa todo o histórico; o resto vira número
 * e valores inválidos (NaN, negativos) ficam para a validação do filtro.
 */
export function parseWindowDays(raw: string | undefined, fallback: number | null): number | null {
    if (raw === undefined || raw.trim() === '') return fallback;
    if (raw.trim().toLowerCase() === 'all') return null;
    return Number(raw);
}
