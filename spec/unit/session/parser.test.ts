import { describe, test, expect } from 'vitest';
import { isIntegerToken, parseCommandLine, parseLoginField, splitLast } from '@src/lib/session/parser.js';

describe('parseLoginField', () => {
    test('should extract the username', () => {
        expect(parseLoginField('User: alice', 'User')).toEqual({ ok: true, value: 'alice' });
    });

    test('should match the label case-insensitively and trim the value', () => {
        expect(parseLoginField('  user :   alice  ', 'User')).toEqual({ ok: true, value: 'alice' });
    });

    test('should keep colons inside the value', () => {
        expect(parseLoginField('Password: a:b:c', 'Password')).toEqual({ ok: true, value: 'a:b:c' });
    });

    test('should reject a line without a colon', () => {
        expect(parseLoginField('alice', 'User')).toEqual({ ok: false, reason: "missing ':' after User" });
    });

    test('should reject the wrong label', () => {
        expect(parseLoginField('Password: x', 'User')).toEqual({
            ok: false,
            reason: "expected User field, got 'Password'",
        });
    });

    test('should reject an empty value', () => {
        expect(parseLoginField('User:   ', 'User')).toEqual({ ok: false, reason: 'empty User value' });
    });
});

describe('parseCommandLine', () => {
    test('should recognise quit with surrounding whitespace', () => {
        expect(parseCommandLine('  quit ')).toEqual({ kind: 'quit' });
    });

    test('should treat a quit command name as quit', () => {
        expect(parseCommandLine('quit: now')).toEqual({ kind: 'quit' });
    });

    test('should split name and payload at the first colon', () => {
        expect(parseCommandLine('caesar: a:b 1')).toEqual({ kind: 'command', name: 'caesar', payload: ' a:b 1' });
    });

    test('should report lines without a colon as malformed', () => {
        expect(parseCommandLine('lcm 4 6')).toEqual({ kind: 'malformed' });
    });
});

describe('splitLast', () => {
    test('should split on the last whitespace run', () => {
        expect(splitLast(' Hello World   3 ')).toEqual(['Hello World', '3']);
    });

    test('should return null without whitespace', () => {
        expect(splitLast('hello')).toBeNull();
        expect(splitLast('   ')).toBeNull();
    });
});

describe('isIntegerToken', () => {
    test('should accept signed decimal integers', () => {
        expect(isIntegerToken('42')).toBe(true);
        expect(isIntegerToken('-7')).toBe(true);
        expect(isIntegerToken('+7')).toBe(true);
    });

    test('should reject everything else', () => {
        expect(isIntegerToken('4.2')).toBe(false);
        expect(isIntegerToken('0x10')).toBe(false);
        expect(isIntegerToken('')).toBe(false);
        expect(isIntegerToken('-')).toBe(false);
    });
});
