import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { SHARING, EDIT } from '@seqtape/kernel';
import { encodeWav, WavIOError, DecodeError } from '@seqtape/codec';
import { TrackEditor } from '../TrackEditor';

describe('TrackEditor', () => {
    let tempDir: string;
    let logSpy: jest.SpyInstance;
    let errorSpy: jest.SpyInstance;

    function writeFixture(name: string, samples: number[]): string {
        const file = path.join(tempDir, name);
        fs.writeFileSync(file, encodeWav(new Int16Array(samples)));
        return file;
    }

    beforeEach(() => {
        tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'seqtape-editor-'));
        logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
        errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
        logSpy.mockRestore();
        errorSpy.mockRestore();
        fs.rmSync(tempDir, { recursive: true, force: true });
    });

    test('uses default configuration', () => {
        const editor = new TrackEditor();

        expect(editor.getThreshold()).toBe(0.95);
        expect(editor.getStore().getSharingPolicy()).toBe(SHARING.COPY);
        expect(logSpy).not.toHaveBeenCalled();
    });

    test('passes store options through', () => {
        const editor = new TrackEditor({ sharing: SHARING.SHARE, segmentCapacity: 8, threshold: 0.5 });

        expect(editor.getThreshold()).toBe(0.5);
        expect(editor.getStore().getConfig()).toEqual({
            segmentCapacity: 8,
            bufferCapacity: 16,
            sharing: SHARING.SHARE
        });
    });

    test('identifies ads in a loaded track', () => {
        const editor = new TrackEditor();
        const target = editor.openTrack(writeFixture('show.wav', [1, 2, 3, 10, 20, 30, 4, 5, 6, 10, 20, 30, 7, 8, 9]));
        const ad = editor.openTrack(writeFixture('ad.wav', [10, 20, 30]));

        expect(editor.identifyAds(target, ad)).toBe('3,5\n9,11');
        expect(editor.findAds(target, ad)).toEqual([
            { start: 3, end: 5 },
            { start: 9, end: 11 }
        ]);
    });

    test('cuts the ads out and saves the result', () => {
        const editor = new TrackEditor();
        const target = editor.openTrack(writeFixture('show.wav', [1, 2, 3, 10, 20, 30, 4, 5, 6, 10, 20, 30, 7, 8, 9]));
        const ad = editor.openTrack(writeFixture('ad.wav', [10, 20, 30]));

        // Delete from the back so earlier ranges keep their indices
        const matches = editor.findAds(target, ad).reverse();
        for (const m of matches) {
            expect(target.deleteRange(m.start, m.end - m.start + 1)).toBe(true);
        }

        const out = path.join(tempDir, 'clean.wav');
        expect(editor.saveTrack(target, out)).toBe(9);

        const reopened = editor.openTrack(out);
        expect(Array.from(reopened.toArray())).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9]);
    });

    test('logs informational lines only when verbose', () => {
        const editor = new TrackEditor({ verbose: true });
        const file = writeFixture('a.wav', new Array<number>(800).fill(1));

        editor.openTrack(file);

        expect(logSpy).toHaveBeenCalledWith('[TrackEditor] Initialized (sharing: copy, threshold: 0.95)');
        expect(logSpy).toHaveBeenCalledWith(`[TrackEditor] Loaded 800 samples from ${file}`);
    });

    test('logs and rethrows a missing file', () => {
        const editor = new TrackEditor();
        const file = path.join(tempDir, 'missing.wav');

        expect(() => editor.openTrack(file)).toThrow(WavIOError);
        expect(errorSpy).toHaveBeenCalledTimes(1);
        expect(errorSpy.mock.calls[0][0]).toBe(`[TrackEditor] Failed to load ${file}:`);
        expect(errorSpy.mock.calls[0][1]).toBeInstanceOf(WavIOError);
        expect(editor.getTrackCount()).toBe(0);
    });

    test('leaves a track untouched when the file does not decode', () => {
        const editor = new TrackEditor();
        const file = path.join(tempDir, 'broken.wav');
        fs.writeFileSync(file, new Uint8Array(12));
        const track = editor.createTrack();
        track.write([4, 5, 6], 0);

        expect(() => editor.loadTrack(track, file)).toThrow(DecodeError);
        expect(Array.from(track.toArray())).toEqual([4, 5, 6]);
    });

    test('logs and rethrows a failed save', () => {
        const editor = new TrackEditor();
        const track = editor.createTrack();
        track.write([1], 0);
        const file = path.join(tempDir, 'missing-dir', 'out.wav');

        expect(() => editor.saveTrack(track, file)).toThrow(WavIOError);
        expect(errorSpy.mock.calls[0][0]).toBe(`[TrackEditor] Failed to save ${file}:`);
    });

    test('shares storage between tracks under the share policy', () => {
        const editor = new TrackEditor({ sharing: SHARING.SHARE });
        const source = editor.createTrack();
        source.write([1, 2, 3, 4], 0);
        const copy = editor.createTrack();

        expect(copy.insert(source, 0, 0, 4)).toBe(4);
        expect(editor.getStore().getBufferCount()).toBe(1);
        expect(source.deleteRange(0, 1)).toBe(false);
        expect(source.getError()).toBe(EDIT.DEPENDENCY_CONFLICT);

        editor.closeTrack(copy);
        expect(source.deleteRange(0, 1)).toBe(true);
    });

    test('releases every track on dispose', () => {
        const editor = new TrackEditor();
        editor.createTrack().write([1, 2], 0);
        editor.createTrack().write([3], 0);

        expect(editor.getStore().getSegmentCount()).toBe(2);
        editor.dispose();

        expect(editor.getTrackCount()).toBe(0);
        expect(editor.getStore().getSegmentCount()).toBe(0);
        expect(editor.getStore().getBufferCount()).toBe(0);
    });
});
