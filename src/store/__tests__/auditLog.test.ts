/**
 * Tests for the CSV audit log, JSON snapshots and mirror copies
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { appendCsvLog, mirrorFile, toCsvRow, writeJsonSnapshot } from '../auditLog.js';
import type { ProofRecord } from '../proofStore.js';

const record: ProofRecord = {
    proofId: 'JNB-0000ABCD',
    designFile: 'A.pes',
    clientTag: 'mani_z',
    bgHex: '#FFF',
    colors: ['#ff0000', '#00ff00'],
    createdUtc: '2026-03-01T12:00:00.000Z',
    generatedPath: '/data/designs/generated/A__mani_z__JNB-0000ABCD.pes',
};

describe('toCsvRow', () => {
    it('should leave plain fields unquoted', () => {
        expect(toCsvRow(['a', 'b'])).toBe('a,b\r\n');
    });

    it('should quote fields with commas, quotes or line breaks', () => {
        expect(toCsvRow(['x,y', 'say "hi"', 'two\nlines'])).toBe('"x,y","say ""hi""","two\nlines"\r\n');
    });
});

describe('audit trail', () => {
    let dir: string;

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), 'audit-'));
    });

    afterEach(() => {
        vi.restoreAllMocks();
        rmSync(dir, { recursive: true, force: true });
    });

    it('should write the header once and one row per proof', () => {
        const csvPath = join(dir, 'proofs_log.csv');
        appendCsvLog(csvPath, record);
        appendCsvLog(csvPath, { ...record, proofId: 'JNB-0000ABCE' });

        expect(readFileSync(csvPath, 'utf-8').split('\r\n')).toEqual([
            'created_utc,proof_id,design_file,client_tag,bg_hex,colors_csv,generated_pes_filename',
            '2026-03-01T12:00:00.000Z,JNB-0000ABCD,A.pes,mani_z,#FFF,"#ff0000,#00ff00",A__mani_z__JNB-0000ABCD.pes',
            '2026-03-01T12:00:00.000Z,JNB-0000ABCE,A.pes,mani_z,#FFF,"#ff0000,#00ff00",A__mani_z__JNB-0000ABCD.pes',
            '',
        ]);
    });

    it('should write a pretty JSON snapshot named after the proof', () => {
        const path = writeJsonSnapshot(dir, record);

        expect(path).toBe(join(dir, 'JNB-0000ABCD.json'));
        const text = readFileSync(path, 'utf-8');
        expect(text.split('\n')[1]).toBe('  "created_utc": "2026-03-01T12:00:00.000Z",');
        expect(JSON.parse(text)).toEqual({
            created_utc: '2026-03-01T12:00:00.000Z',
            proof_id: 'JNB-0000ABCD',
            design_file: 'A.pes',
            client_tag: 'mani_z',
            bg_hex: '#FFF',
            colors: ['#ff0000', '#00ff00'],
            generated_pes_filename: 'A__mani_z__JNB-0000ABCD.pes',
        });
    });

    describe('mirrorFile', () => {
        it('should do nothing without a mirror directory', () => {
            expect(mirrorFile(join(dir, 'x.csv'), null)).toEqual({ path: join(dir, 'x.csv'), status: 'disabled' });
        });

        it('should copy the file by base name', () => {
            const source = join(dir, 'proofs_log.csv');
            const mirror = join(dir, 'mirror');
            mkdirSync(mirror);
            writeFileSync(source, 'data');

            expect(mirrorFile(source, mirror)).toEqual({
                path: source,
                status: 'copied',
                target: join(mirror, 'proofs_log.csv'),
            });
            expect(readFileSync(join(mirror, 'proofs_log.csv'), 'utf-8')).toBe('data');
        });

        it('should report and log a failed copy without throwing', () => {
            const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
            const source = join(dir, 'proofs_log.csv');
            writeFileSync(source, 'data');

            const outcome = mirrorFile(source, join(dir, 'missing-dir'));

            expect(outcome.status).toBe('failed');
            expect(existsSync(join(dir, 'missing-dir'))).toBe(false);
            expect(spy).toHaveBeenCalledTimes(1);
        });
    });
});
