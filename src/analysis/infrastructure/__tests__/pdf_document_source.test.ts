import pdf from "pdf-parse";
import { ServiceError } from "../../domain/errors";
import { createPdfDocumentSource, extractPdfText } from "../pdf_document_source";

jest.mock("pdf-parse", () => jest.fn());

const mockedPdf = jest.mocked(pdf);

function parsed(text: string, numpages = 1) {
  return {
    numpages,
    numrender: numpages,
    info: {},
    metadata: null,
    version: "v1.10.100" as const,
    text,
  };
}

describe("extractPdfText", () => {
  beforeEach(() => mockedPdf.mockReset());

  test("returns the text layer", async () => {
    mockedPdf.mockResolvedValue(parsed("Revenue 40bn"));
    await expect(extractPdfText(Buffer.from("%PDF-1.7"))).resolves.toBe(
      "Revenue 40bn"
    );
  });

  test("a scanned PDF yields empty text rather than an error", async () => {
    mockedPdf.mockResolvedValue(parsed("", 12));
    await expect(extractPdfText(Buffer.from("%PDF-1.7"))).resolves.toBe("");
  });

  test("parser failures become ServiceError", async () => {
    mockedPdf.mockRejectedValue(new Error("Invalid PDF structure"));
    const extracted = extractPdfText(Buffer.from("nope"));
    await expect(extracted).rejects.toBeInstanceOf(ServiceError);
    await expect(extracted).rejects.toThrow(
      "PDF parsing failed: Invalid PDF structure"
    );
  });

  test("the document source passes buffers straight through", async () => {
    mockedPdf.mockResolvedValue(parsed("ESG report"));
    const buffer = Buffer.from("%PDF-1.7");
    await expect(createPdfDocumentSource().loadText(buffer)).resolves.toBe(
      "ESG report"
    );
    expect(mockedPdf).toHaveBeenCalledWith(buffer);
  });
});
