import { readFile } from 'fs/promises';
import * as pdfjsLib from 'pdfjs-dist/legacy/build/pdf.mjs';
import { DocumentReadError, describeError } from '../types/errors';
import type { EncodedImage, PageRecord, RawImage } from '../types/grading';
import { encodeThumbnail } from './imageEncoder';

type PdfDocument = Awaited<ReturnType<typeof pdfjsLib.getDocument>['promise']>;
type PdfPage = Awaited<ReturnType<PdfDocument['getPage']>>;

// pdfjs ImageKind
const GRAYSCALE_1BPP = 1;
const RGB_24BPP = 2;
const RGBA_32BPP = 3;

export interface DecodedImage {
    width: number;
    height: number;
    kind: number;
    data: Uint8Array | Uint8ClampedArray;
}

/** Stencil mask as pdfjs hands it over: 1bpp, byte-padded rows, no kind. */
export interface DecodedMask {
    width: number;
    height: number;
    data: Uint8Array | Uint8ClampedArray;
}

export interface DocumentExtractor {
    extract(path: string): Promise<PageRecord[]>;
}

function isDecodedMask(value: unknown): value is DecodedMask {
    if (typeof value !== 'object' || value === null) return false;
    return 'width' in value && typeof value.width === 'number'
        && 'height' in value && typeof value.height === 'number'
        && 'data' in value && (value.data instanceof Uint8Array || value.data instanceof Uint8ClampedArray);
}

function isDecodedImage(value: unknown): value is DecodedImage {
    return isDecodedMask(value) && 'kind' in value && typeof value.kind === 'number';
}

function bytesOf(data: Uint8Array | Uint8ClampedArray): Uint8Array {
    return new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
}

function expandOneBit(width: number, height: number, data: Uint8Array): RawImage {
    const rowBytes = Math.ceil(width / 8);
    const out = new Uint8Array(width * height);
    for (let y = 0; y < height; y++) {
        for (let x = 0; x < width; x++) {
            const byte = data[y * rowBytes + (x >> 3)];
            out[y * width + x] = byte & (0x80 >> (x & 7)) ? 255 : 0;
        }
    }
    return { width, height, channels: 1, data: out };
}

/**
 * Painted mask samples come through as clear bits, so they render black on white.
 */
export function maskToRawImage(mask: DecodedMask): RawImage {
    return expandOneBit(mask.width, mask.height, bytesOf(mask.data));
}

/**
 * Maps pdfjs' decoded image layouts onto a plain channel-interleaved buffer.
 * 1bpp rows are byte-padded; a set bit is white.
 */
export function toRawImage(image: DecodedImage): RawImage {
    const { width, height, kind } = image;
    const data = bytesOf(image.data);
    switch (kind) {
        case RGB_24BPP:
            return { width, height, channels: 3, data };
        case RGBA_32BPP:
            return { width, height, channels: 4, data };
        case GRAYSCALE_1BPP:
            return expandOneBit(width, height, data);
        default:
            throw new Error(`Unsupported image kind ${kind}`);
    }
}

export class PDFProcessor implements DocumentExtractor {
    async extract(path: string): Promise<PageRecord[]> {
        console.log(`[PDFProcessor] Extracting page-wise text and images from: ${path}`);

        let bytes: Uint8Array;
        try {
            bytes = new Uint8Array(await readFile(path));
        } catch (error) {
            throw new DocumentReadError(path, describeError(error), error);
        }

        const loadingTask = pdfjsLib.getDocument({
            data: bytes,
            isEvalSupported: false,
            isOffscreenCanvasSupported: false,
            disableFontFace: true,
            stopAtErrors: true,
            verbosity: 0
        });

        try {
            const document = await loadingTask.promise;
            const pages: PageRecord[] = [];
            for (let pageNumber = 1; pageNumber <= document.numPages; pageNumber++) {
                const page = await document.getPage(pageNumber);
                try {
                    const text = await this.extractText(page);
                    const images = await this.extractImages(page);
                    pages.push({ pageNumber, text, images });
                } finally {
                    page.cleanup();
                }
            }
            console.log(`[PDFProcessor] ${path}: ${pages.length} pages, ${pages.reduce((n, p) => n + p.images.length, 0)} images.`);
            return pages;
        } catch (error) {
            throw new DocumentReadError(path, describeError(error), error);
        } finally {
            await loadingTask.destroy();
        }
    }

    private async extractText(page: PdfPage): Promise<string> {
        const content = await page.getTextContent();
        let text = '';
        for (const item of content.items) {
            if (!('str' in item)) continue;
            text += item.str;
            if (item.hasEOL) text += '\n';
        }
        return text;
    }

    private async extractImages(page: PdfPage): Promise<EncodedImage[]> {
        const operatorList = await page.getOperatorList();
        const { OPS } = pdfjsLib;
        const seenIds = new Set<string>();
        const seenMasks = new Set<unknown>();
        const images: EncodedImage[] = [];

        const failure = () => new Error(`Image ${images.length + 1} on page ${page.pageNumber} could not be decoded`);
        // Mask args carry either the packed bits or the id they were sent under.
        const pushMask = async (arg: unknown) => {
            if (typeof arg !== 'object' || arg === null || !('data' in arg)) throw failure();
            const ref = arg.data;
            const key: unknown = typeof ref === 'string' ? ref : arg;
            if (seenMasks.has(key)) return;
            seenMasks.add(key);
            const mask = typeof ref === 'string' ? await resolveObject(page, ref) : arg;
            if (!isDecodedMask(mask)) throw failure();
            images.push(await encodeThumbnail(maskToRawImage(mask)));
        };

        for (let i = 0; i < operatorList.fnArray.length; i++) {
            const fn = operatorList.fnArray[i];
            const args: unknown = operatorList.argsArray[i];
            if (!Array.isArray(args)) continue;

            switch (fn) {
                case OPS.paintImageXObject:
                case OPS.paintImageXObjectRepeat: {
                    const objId: unknown = args[0];
                    if (typeof objId !== 'string' || seenIds.has(objId)) break;
                    seenIds.add(objId);
                    const decoded = await resolveObject(page, objId);
                    if (!isDecodedImage(decoded)) throw failure();
                    images.push(await encodeThumbnail(toRawImage(decoded)));
                    break;
                }
                // A group arrives as one atlas of several small inline images.
                case OPS.paintInlineImageXObject:
                case OPS.paintInlineImageXObjectGroup: {
                    const decoded: unknown = args[0];
                    if (!isDecodedImage(decoded)) throw failure();
                    images.push(await encodeThumbnail(toRawImage(decoded)));
                    break;
                }
                case OPS.paintImageMaskXObject:
                case OPS.paintImageMaskXObjectRepeat:
                    await pushMask(args[0]);
                    break;
                case OPS.paintImageMaskXObjectGroup: {
                    const group: unknown = args[0];
                    if (!Array.isArray(group)) throw failure();
                    for (const mask of group) await pushMask(mask);
                    break;
                }
            }
        }
        return images;
    }
}

function resolveObject(page: PdfPage, objId: string): Promise<unknown> {
    // Images shared across pages live in the document-wide store.
    const store = objId.startsWith('g_') ? page.commonObjs : page.objs;
    return new Promise((resolve) => {
        store.get(objId, (value: unknown) => resolve(value));
    });
}
