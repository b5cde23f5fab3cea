import { PDFDocument } from "pdf-lib";
import { absent, present, type Maybe } from "../models/invoiceModel";
import { describeError, type Logger } from "./logger";

export function isPDFValid(fileBuffer: Buffer): boolean {
  if (fileBuffer.length < 5) {
    return false;
  }
  return fileBuffer.toString("ascii", 0, 5) === "%PDF-";
}

/** Page count of the PDF, or absent when pdf-lib cannot parse it. */
export async function countPages(fileBuffer: Buffer, fileName: string, logger: Logger): Promise<Maybe<number>> {
  try {
    // Lenient load: scanned reports are often slightly malformed or encrypted.
    const pdfDoc = await PDFDocument.load(fileBuffer, {
      ignoreEncryption: true,
      throwOnInvalidObject: false,
      updateMetadata: false,
    });
    const numPages = pdfDoc.getPageCount();
    logger.log(`PDF ${fileName} has ${numPages} pages`);
    return present(numPages);
  } catch (error) {
    logger.warn(`Could not count pages of ${fileName}: ${describeError(error)}`);
    return absent;
  }
}
