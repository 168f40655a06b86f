import { pdf } from 'pdf-to-img';
import { logger } from './logger.js';

const log = logger.child({ module: 'pdf-rasterizer' });

export interface PdfRasterizer {
  /** Renders page 1 of the PDF to an in-memory PNG. */
  renderFirstPage(pdfPath: string): Promise<Buffer>;
}

/** The part of a pdf-to-img document this module reads. */
export interface RenderedDocument {
  length: number;
  getPage(pageNumber: number): Promise<Buffer>;
}

export type OpenPdf = (pdfPath: string, options: { scale: number }) => Promise<RenderedDocument>;

export class PdfToImgRasterizer implements PdfRasterizer {
  private readonly scale: number;
  private readonly open: OpenPdf;

  constructor(scale: number, open: OpenPdf = pdf) {
    this.scale = scale;
    this.open = open;
  }

  async renderFirstPage(pdfPath: string): Promise<Buffer> {
    const document = await this.open(pdfPath, { scale: this.scale });

    const page = await document.getPage(1);
    log.debug({ pdfPath, pageCount: document.length, sizeBytes: page.length }, 'Rendered first page');
    return page;
  }
}
