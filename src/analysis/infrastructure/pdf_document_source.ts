import { readFile } from "node:fs/promises";
import pdf from "pdf-parse";
import { ServiceError, describeError } from "../domain/errors";
import { getLogger } from "../../util/logger";
import type { DocumentSource } from "./contracts";

const logger = getLogger("analysis/pdf_document_source");

export async function extractPdfText(buffer: Buffer): Promise<string> {
  let data: Awaited<ReturnType<typeof pdf>>;
  try {
    data = await pdf(buffer);
  } catch (err) {
    throw new ServiceError(`PDF parsing failed: ${describeError(err)}`, {
      cause: err,
    });
  }
  if (data.text.trim().length === 0) {
    // Scanned reports parse fine but carry no text layer
    logger.warn({ pages: data.numpages }, "PDF has no extractable text");
  } else {
    logger.debug(
      { pages: data.numpages, chars: data.text.length },
      "PDF text extracted"
    );
  }
  return data.text;
}

export function createPdfDocumentSource(): DocumentSource {
  return {
    async loadText(input: Buffer | string): Promise<string> {
      const buffer = typeof input === "string" ? await readFile(input) : input;
      return extractPdfText(buffer);
    },
  };
}
