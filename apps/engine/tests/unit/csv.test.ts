import { escapeCsvField, toCsv } from '../../src/utils/csv';

describe('csv', () => {
    it('leaves plain fields untouched', () => {
        expect(escapeCsvField('step_started')).toBe('step_started');
    });

    it('quotes fields with commas, quotes and newlines', () => {
        expect(escapeCsvField('a,b')).toBe('"a,b"');
        expect(escapeCsvField('say "hi"')).toBe('"say ""hi"""');
        expect(escapeCsvField('line1\nline2')).toBe('"line1\nline2"');
    });

    it('joins rows with CRLF and ends with one', () => {
        expect(toCsv(['a', 'b'], [['1', '2,3']])).toBe('a,b\r\n1,"2,3"\r\n');
    });
});
