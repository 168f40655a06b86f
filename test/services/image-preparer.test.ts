import { mkdtemp, readdir, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import sharp from 'sharp';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { prepareImage, temporaryImagePath } from '../../src/services/image-preparer/index.js';
import type { PdfRasterizer } from '../../src/infrastructure/pdf-rasterizer.js';

async function pngPage(): Promise<Buffer> {
  return sharp({
    create: { width: 40, height: 60, channels: 3, background: { r: 255, g: 255, b: 255 } },
  })
    .png()
    .toBuffer();
}

describe('temporaryImagePath', () => {
  it('includes the process id', () => {
    expect(temporaryImagePath('/tmp', 4242)).toBe('/tmp/scan-renamer-4242.jpg');
  });
});

describe('prepareImage', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'prepare-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('passes PNG and JPG files through untouched', async () => {
    const rasterizer: PdfRasterizer = { renderFirstPage: vi.fn() };

    expect(await prepareImage('/scans/photo.png', { rasterizer })).toEqual({
      ok: true,
      value: { sourcePath: '/scans/photo.png', isTemporary: false },
    });
    expect(await prepareImage('/scans/photo.JPG', { rasterizer })).toEqual({
      ok: true,
      value: { sourcePath: '/scans/photo.JPG', isTemporary: false },
    });
    expect(rasterizer.renderFirstPage).not.toHaveBeenCalled();
  });

  it('renders page one of a PDF to a temporary JPEG', async () => {
    const page = await pngPage();
    const rasterizer: PdfRasterizer = { renderFirstPage: vi.fn().mockResolvedValue(page) };

    const result = await prepareImage('/scans/scan0001.pdf', { rasterizer, tempDir: dir, pid: 7 });

    expect(result).toEqual({ ok: true, value: { sourcePath: join(dir, 'scan-renamer-7.jpg'), isTemporary: true } });
    expect(rasterizer.renderFirstPage).toHaveBeenCalledWith('/scans/scan0001.pdf');
    const metadata = await sharp(join(dir, 'scan-renamer-7.jpg')).metadata();
    expect(metadata.format).toBe('jpeg');
    expect(metadata.width).toBe(40);
  });

  it('returns PDF_RENDER_FAILED when rasterizing fails', async () => {
    const rasterizer: PdfRasterizer = {
      renderFirstPage: vi.fn().mockRejectedValue(new Error('Invalid PDF structure')),
    };

    const result = await prepareImage('/scans/broken.pdf', { rasterizer, tempDir: dir });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('PDF_RENDER_FAILED');
    expect(result.error.details).toBe('Invalid PDF structure');
    expect(await readdir(dir)).toEqual([]);
  });

  it('rejects other extensions', async () => {
    const rasterizer: PdfRasterizer = { renderFirstPage: vi.fn() };

    const result = await prepareImage('/scans/notes.txt', { rasterizer });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('UNSUPPORTED_FILE_TYPE');
  });
});
