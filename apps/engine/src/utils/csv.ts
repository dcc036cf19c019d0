// RFC 4180: quote fields containing comma, quote, CR or LF; double inner quotes.
export function escapeCsvField(value: string): string {
    if (/[",\r\n]/.test(value)) {
        return `"${value.replace(/"/g, '""')}"`;
    }
    return value;
}

export function toCsv(header: string[], rows: string[][]): string {
    return [header, ...rows].map(row => row.map(escapeCsvField).join(',')).join('\r\n') + '\r\n';
}
