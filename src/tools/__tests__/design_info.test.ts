/**
 * Tests for design listing, design info and slug links
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { writeFileSync } from 'fs';
import { join } from 'path';
import { designInfoHandler, listDesignsHandler, resolveDesignLinkHandler } from '../design_info.js';
import { createWorkspace, errorOf, twoBlockPattern, type Workspace } from '../../__tests__/helpers.js';

describe('design tools', () => {
    let ws: Workspace;

    beforeEach(() => {
        ws = createWorkspace();
        ws.addDesign('B.dst', twoBlockPattern());
        ws.addDesign('A.pes', twoBlockPattern());
        writeFileSync(join(ws.config.masterDir, 'notes.txt'), 'not a design');
    });

    afterEach(() => {
        ws.cleanup();
        vi.restoreAllMocks();
    });

    it('should list supported master files in name order', () => {
        expect(listDesignsHandler(ws.ctx)).toEqual({
            designs: ['A.pes', 'B.dst'],
            formats: ['.dst', '.pes'],
        });
    });

    it('should report thread colors and block count', () => {
        expect(designInfoHandler(ws.ctx, { design: 'B.dst' })).toEqual({
            design: 'B.dst',
            colors: ['#112233', '#445566', '#778899'],
            blockCount: 2,
        });
    });

    it('should not treat unlisted files as designs', () => {
        const error = errorOf(() => designInfoHandler(ws.ctx, { design: 'notes.txt' }));
        expect(error).toMatchObject({ kind: 'not_found', message: 'Design file not found in designs/master.' });
    });

    it('should refuse names that escape the master folder', () => {
        const error = errorOf(() => designInfoHandler(ws.ctx, { design: '../proofs.db' }));
        expect(error).toMatchObject({ kind: 'not_found' });
    });

    describe('design links', () => {
        it('should resolve a mapped slug to its design info', () => {
            writeFileSync(ws.config.designMapPath, JSON.stringify({ rose: 'A.pes' }));

            expect(resolveDesignLinkHandler(ws.ctx, { slug: 'rose' })).toEqual({
                design: 'A.pes',
                colors: ['#112233', '#445566', '#778899'],
                blockCount: 2,
            });
        });

        it('should reject an unknown slug', () => {
            writeFileSync(ws.config.designMapPath, JSON.stringify({ rose: 'A.pes' }));
            const error = errorOf(() => resolveDesignLinkHandler(ws.ctx, { slug: 'tulip' }));
            expect(error).toMatchObject({ kind: 'not_found', message: 'Unknown design link.' });
        });

        it('should not resolve inherited object keys', () => {
            writeFileSync(ws.config.designMapPath, '{}');
            const error = errorOf(() => resolveDesignLinkHandler(ws.ctx, { slug: 'toString' }));
            expect(error).toMatchObject({ message: 'Unknown design link.' });
        });

        it('should reject a slug that points at a missing design', () => {
            writeFileSync(ws.config.designMapPath, JSON.stringify({ old: 'gone.dst' }));
            const error = errorOf(() => resolveDesignLinkHandler(ws.ctx, { slug: 'old' }));
            expect(error).toMatchObject({ kind: 'not_found', message: 'Design file not found in designs/master.' });
        });

        it('should treat an unreadable map as empty', () => {
            const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
            writeFileSync(ws.config.designMapPath, '{ not json');

            const error = errorOf(() => resolveDesignLinkHandler(ws.ctx, { slug: 'rose' }));

            expect(error).toMatchObject({ message: 'Unknown design link.' });
            expect(spy).toHaveBeenCalledTimes(1);
        });

        it('should treat a map without a file as empty', () => {
            const error = errorOf(() => resolveDesignLinkHandler(ws.ctx, { slug: 'rose' }));
            expect(error).toMatchObject({ message: 'Unknown design link.' });
        });
    });
});
