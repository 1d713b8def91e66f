import { PDFDocument, StandardFonts } from "pdf-lib";
import sharp from "sharp";
import { describe, expect, it } from "vitest";
import { PdfLibBackend } from "../pdf-backend";

async function buildPdf(): Promise<Buffer> {
    const pdf = await PDFDocument.create();
    const font = await pdf.embedFont(StandardFonts.Helvetica);

    const first = pdf.addPage([300, 200]);
    first.drawText("Hello from page one", { x: 20, y: 150, size: 12, font });

    const red = await sharp({
        create: { width: 4, height: 3, channels: 3, background: { r: 255, g: 0, b: 0 } },
    })
        .png()
        .toBuffer();
    const image = await pdf.embedPng(red);
    const second = pdf.addPage([300, 200]);
    second.drawImage(image, { x: 10, y: 10, width: 40, height: 30 });

    return Buffer.from(await pdf.save());
}

describe("PdfLibBackend", () => {
    it("reads the text layer and page images of a generated document", async () => {
        const pages = await new PdfLibBackend().readPages(await buildPdf());

        expect(pages.map((page) => [page.pageNumber, page.text])).toEqual([
            [1, "Hello from page one"],
            [2, ""],
        ]);

        await expect(pages[0]?.renderImages()).resolves.toEqual([]);

        const images = (await pages[1]?.renderImages()) ?? [];
        expect(images).toHaveLength(1);
        const metadata = await sharp(images[0]).metadata();
        expect(metadata).toMatchObject({ format: "png", width: 4, height: 3 });
    });

    it("rejects bytes that are not a PDF", async () => {
        await expect(new PdfLibBackend().readPages(Buffer.from("plain text"))).rejects.toThrow();
    });
});
