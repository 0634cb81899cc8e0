type TimeUnit = "d" | "h" | "m" | "s" | "ms";

const TO_MS: Record<TimeUnit, number> = {
    d: 86400000,
    h: 3600000,
    m: 60000,
    s: 1000,
    ms: 1
};

export function convertTime(value: number, from: TimeUnit, to: TimeUnit): number {
    const inMs = value * TO_MS[from];
    return inMs / TO_MS[to];
}

// "YYYY-MM-DD HH:mm" em UTC, usado nos relatórios em texto
export function formatDateTime(timestamp: number): string {
    return new Date(timestamp).toISOString().slice(0, 16).replace("T", " ");
}
