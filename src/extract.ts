/**
 * PDF text extraction using Mozilla's pdfjs-dist.
 *
 * Parses straight from the in-memory buffer, one string per page. The
 * legacy build is the one pdfjs supports under Node; it is imported lazily
 * so that code paths which never extract (search, tests with a fake
 * extractor) never load it.
 */

import { ExtractionError, errorMessage } from "./errors";
import type { ExtractPages } from "./types";

export const extractPdfPages: ExtractPages = async (bytes, sourcePath) => {
  try {
    const pdfjs = await import("pdfjs-dist/legacy/build/pdf.mjs");

    // pdfjs takes ownership of (and detaches) the buffer it is given
    const loadingTask = pdfjs.getDocument({
      data: new Uint8Array(bytes),
      isEvalSupported: false,
      useSystemFonts: false,
      verbosity: pdfjs.VerbosityLevel.ERRORS,
    });
    const pdfDocument = await loadingTask.promise;

    try {
      const pages: string[] = [];
      for (let pageNum = 1; pageNum <= pdfDocument.numPages; pageNum++) {
        const page = await pdfDocument.getPage(pageNum);
        const textContent = await page.getTextContent();

        let text = "";
        for (const item of textContent.items) {
          if (!("str" in item)) continue; // marked-content boundaries
          text += item.str;
          if (item.hasEOL) text += "\n";
        }
        pages.push(text);
        page.cleanup();
      }
      return pages;
    } finally {
      await pdfDocument.destroy();
    }
  } catch (err) {
    throw new ExtractionError(
      `Unable to read PDF '${sourcePath}': ${errorMessage(err)}`,
      { cause: err }
    );
  }
};
