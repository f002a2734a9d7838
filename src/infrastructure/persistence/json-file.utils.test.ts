// src/infrastructure/persistence/json-file.utils.test.ts
import fs from 'fs';
import os from 'os';
import path from 'path';

import { copyFileIfExists, readJsonFile, writeJsonFileAtomic } from './json-file.utils';

describe('json-file.utils', () => {
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'json-file-test-'));
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    describe('readJsonFile', () => {
        it('reports a missing file as missing', () => {
            expect(readJsonFile(path.join(dir, 'absent.json'))).toEqual({ status: 'missing' });
        });

        it('parses an existing file', () => {
            const file = path.join(dir, 'ledger.json');
            fs.writeFileSync(file, '{"2024":{}}');
            expect(readJsonFile(file)).toEqual({ status: 'ok', document: { '2024': {} } });
        });

        it('reports invalid JSON as unreadable', () => {
            const file = path.join(dir, 'ledger.json');
            fs.writeFileSync(file, '{ not json');
            const result = readJsonFile(file);
            expect(result.status).toBe('unreadable');
            if (result.status === 'unreadable') {
                expect(result.reason.startsWith('invalid JSON: ')).toBe(true);
            }
        });

        it('reports a directory as unreadable, not missing', () => {
            expect(readJsonFile(dir).status).toBe('unreadable');
        });
    });

    describe('writeJsonFileAtomic', () => {
        it('creates parent directories and leaves no temp file', () => {
            const file = path.join(dir, 'nested', 'report.json');
            writeJsonFileAtomic(file, { a: 1 });
            expect(JSON.parse(fs.readFileSync(file, 'utf8'))).toEqual({ a: 1 });
            expect(fs.existsSync(`${file}.tmp`)).toBe(false);
        });
    });

    describe('copyFileIfExists', () => {
        it('returns null when the source does not exist', () => {
            expect(copyFileIfExists(path.join(dir, 'absent.json'), path.join(dir, 'copy.json'))).toBeNull();
        });

        it('never replaces an earlier copy with the same name', () => {
            const source = path.join(dir, 'ledger.json');
            const target = path.join(dir, 'ledger.json.bak');

            fs.writeFileSync(source, 'first');
            expect(copyFileIfExists(source, target)).toBe(target);
            fs.writeFileSync(source, 'second');
            expect(copyFileIfExists(source, target)).toBe(`${target}.1`);
            fs.writeFileSync(source, 'third');
            expect(copyFileIfExists(source, target)).toBe(`${target}.2`);

            expect(fs.readFileSync(target, 'utf8')).toBe('first');
            expect(fs.readFileSync(`${target}.1`, 'utf8')).toBe('second');
            expect(fs.readFileSync(`${target}.2`, 'utf8')).toBe('third');
        });
    });
});
