import { describe, it, expect } from 'vitest';
import { tokenizeContent, tokenizeFileName } from '../../src/tokenizer/index.js';

describe('tokenizeFileName', () => {
    it('treats dot, underscore and hyphen as spaces', () => {
        expect(tokenizeFileName('Chase_Bank-Statement.Jan')).toEqual(tokenizeFileName('chase bank statement jan'));
        expect([...tokenizeFileName('Chase_Bank-Statement.Jan')]).toEqual(['chase', 'bank', 'statement', 'jan']);
    });

    it('drops tokens shorter than two characters', () => {
        expect([...tokenizeFileName('a_bc-d')]).toEqual(['bc']);
        expect(tokenizeFileName('A_B-C.D').size).toBe(0);
    });

    it('splits on any other non-alphanumeric character', () => {
        expect([...tokenizeFileName('Acme&Co (2023)')]).toEqual(['acme', 'co', '2023']);
    });

    it('keeps letters outside ASCII', () => {
        expect([...tokenizeFileName('Société_Générale')]).toEqual(['société', 'générale']);
    });

    it('is idempotent over its own output', () => {
        const first = tokenizeFileName('Amex_Gold-2023.03');
        expect(tokenizeFileName([...first].join(' '))).toEqual(first);
    });

    it('keeps decomposed accents inside the word', () => {
        const expected = new Set(['société', 'générale'].map(token => token.normalize('NFC')));
        expect(tokenizeFileName('Société Générale'.normalize('NFD'))).toEqual(expected);
    });

    it('gives decomposed and precomposed names the same tokens', () => {
        expect(tokenizeFileName('Crédit_Agricole-2023.pdf'.normalize('NFD')))
            .toEqual(tokenizeFileName('Crédit_Agricole-2023.pdf'.normalize('NFC')));
    });

    it('returns an empty set for an empty name', () => {
        expect(tokenizeFileName('').size).toBe(0);
    });
});

describe('tokenizeContent', () => {
    it('lowercases and strips edge punctuation', () => {
        const tokens = tokenizeContent('Statement Date: 03/15/2023\nAccount, Summary.');
        expect([...tokens]).toEqual(['statement', 'date', '03/15/2023', 'account', 'summary']);
    });

    it('drops tokens that are only punctuation or too short', () => {
        expect([...tokenizeContent('"Hello" -- (ok) a')]).toEqual(['hello', 'ok']);
    });

    it('keeps currency symbols, which are not punctuation', () => {
        expect(tokenizeContent('Total $100.00').has('$100.00')).toBe(true);
    });

    it('ignores leading and trailing whitespace', () => {
        expect([...tokenizeContent('  balance  ')]).toEqual(['balance']);
    });

    it('normalizes decomposed accents', () => {
        const tokens = tokenizeContent('Relevé de compte'.normalize('NFD'));
        expect([...tokens]).toEqual(['relevé', 'de', 'compte'].map(token => token.normalize('NFC')));
    });

    it('deduplicates repeated words', () => {
        expect(tokenizeContent('Fee fee FEE').size).toBe(1);
    });
});
