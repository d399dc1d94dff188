import sharp from 'sharp';
import type { EncodedImage, RawImage } from '../types/grading';

export const MAX_IMAGE_SIZE = 512;

/**
 * Converts a CMYK(+extra) pixel buffer to RGB. Channels past the fourth are dropped.
 */
export function cmykToRgb(image: RawImage): RawImage {
    const { width, height, channels, data } = image;
    const pixels = width * height;
    const out = new Uint8Array(pixels * 3);
    for (let i = 0; i < pixels; i++) {
        const src = i * channels;
        const k = 1 - data[src + 3] / 255;
        out[i * 3] = Math.round(255 * (1 - data[src] / 255) * k);
        out[i * 3 + 1] = Math.round(255 * (1 - data[src + 1] / 255) * k);
        out[i * 3 + 2] = Math.round(255 * (1 - data[src + 2] / 255) * k);
    }
    return { width, height, channels: 3, data: out };
}

function isSharpChannelCount(n: number): n is 1 | 2 | 3 | 4 {
    return n === 1 || n === 2 || n === 3 || n === 4;
}

// pdfjs converts CMYK itself; five or more channels only come from other RawImage producers.
export function normalizeChannels(image: RawImage): RawImage {
    if (image.channels >= 5) return cmykToRgb(image);
    if (image.channels < 1) {
        throw new Error(`Unsupported channel count ${image.channels}`);
    }
    return image;
}

/**
 * Downscales to fit inside MAX_IMAGE_SIZE x MAX_IMAGE_SIZE (never enlarging) and encodes as base64 PNG.
 */
export async function encodeThumbnail(image: RawImage, maxSize: number = MAX_IMAGE_SIZE): Promise<EncodedImage> {
    const normalized = normalizeChannels(image);
    const expected = normalized.width * normalized.height * normalized.channels;
    if (normalized.data.length < expected) {
        throw new Error(`Pixel buffer too short: expected ${expected} bytes, got ${normalized.data.length}`);
    }

    const channels = normalized.channels;
    if (!isSharpChannelCount(channels)) {
        throw new Error(`Unsupported channel count ${channels}`);
    }

    const buffer = await sharp(normalized.data.subarray(0, expected), {
        raw: { width: normalized.width, height: normalized.height, channels }
    })
        .flatten({ background: '#ffffff' })
        .resize(maxSize, maxSize, { fit: 'inside', withoutEnlargement: true })
        .png()
        .toBuffer();

    return buffer.toString('base64');
}
