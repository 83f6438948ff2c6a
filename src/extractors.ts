import { promises as fs } from 'node:fs';
import path from 'node:path';
import { ExtractionError, UnsupportedFileTypeError, errorMessage } from './errors.js';

export type FileCategory =
  | 'presentation'
  | 'pdf'
  | 'word'
  | 'spreadsheet'
  | 'csv'
  | 'json'
  | 'image'
  | 'text';

export interface FileFormat {
  category: FileCategory;
  kind: string;  // document kind tag stored with the extracted text
  label: string;
  extensions: readonly string[];
}

export type TextExtractor = (filePath: string) => Promise<string>;

export const FILE_FORMATS: readonly FileFormat[] = [
  { category: 'presentation', kind: 'pitch_deck_powerpoint', label: 'Presentations', extensions: ['.pptx', '.ppt'] },
  { category: 'pdf', kind: 'document_pdf', label: 'PDF documents', extensions: ['.pdf'] },
  { category: 'word', kind: 'document_word', label: 'Word documents', extensions: ['.docx', '.doc'] },
  { category: 'spreadsheet', kind: 'spreadsheet_excel', label: 'Spreadsheets', extensions: ['.xlsx', '.xls'] },
  { category: 'csv', kind: 'spreadsheet_csv', label: 'CSV files', extensions: ['.csv'] },
  { category: 'json', kind: 'data_json', label: 'JSON data', extensions: ['.json'] },
  { category: 'image', kind: 'image_file', label: 'Images (OCR)', extensions: ['.jpg', '.jpeg', '.png', '.bmp', '.tiff', '.gif'] },
  { category: 'text', kind: 'text_document', label: 'Text and markdown', extensions: ['.txt', '.md', '.markdown'] }
];

export const UNKNOWN_TEXT_KIND = 'unknown_text_file';

export interface ResolvedExtraction {
  kind: string;
  extension: string;
  text: string;
}

export const readTextFile: TextExtractor = async filePath => fs.readFile(filePath, 'utf-8');

export const extractJson: TextExtractor = async filePath => {
  const raw = await fs.readFile(filePath, 'utf-8');
  const data: unknown = JSON.parse(raw);
  return ['=== JSON DATA ===', '', JSON.stringify(data, null, 2)].join('\n');
};

export const extractCsv: TextExtractor = async filePath => {
  const raw = await fs.readFile(filePath, 'utf-8');
  const rows = raw.split(/\r?\n/).filter(line => line.trim() !== '');
  const [header, ...body] = rows;
  const columns = header === undefined ? 0 : header.split(',').length;
  return [`=== CSV DATA (${body.length} rows, ${columns} columns) ===`, '', ...rows].join('\n');
};

/**
 * Maps file extensions to formats and formats to extractors. Presentation,
 * PDF, word, spreadsheet and image formats are recognised out of the box but
 * only extract once the host registers a parser for them.
 */
export class ExtractorRegistry {
  private extractors = new Map<FileCategory, TextExtractor>();

  constructor(extractors: Partial<Record<FileCategory, TextExtractor>> = {}) {
    this.register('text', readTextFile);
    this.register('json', extractJson);
    this.register('csv', extractCsv);
    for (const [category, extractor] of Object.entries(extractors)) {
      const format = FILE_FORMATS.find(f => f.category === category);
      if (format && extractor) {
        this.register(format.category, extractor);
      }
    }
  }

  register(category: FileCategory, extractor: TextExtractor): this {
    this.extractors.set(category, extractor);
    return this;
  }

  formatFor(filePath: string): FileFormat | undefined {
    const extension = path.extname(filePath).toLowerCase();
    return FILE_FORMATS.find(format => format.extensions.includes(extension));
  }

  supportedFormatsDescription(): string {
    const lines = FILE_FORMATS.map(format => {
      const note = this.extractors.has(format.category) ? '' : ' (parser not installed)';
      return `- ${format.label}: ${format.extensions.join(', ')}${note}`;
    });
    return ['Supported formats:', ...lines].join('\n');
  }

  async extract(filePath: string): Promise<ResolvedExtraction> {
    const extension = path.extname(filePath).toLowerCase();
    const format = this.formatFor(filePath);

    if (!format) {
      return this.extractUnknown(filePath, extension);
    }

    const extractor = this.extractors.get(format.category);
    if (!extractor) {
      throw new UnsupportedFileTypeError(
        extension,
        `No ${format.category} parser is registered.\n${this.supportedFormatsDescription()}`
      );
    }

    let text: string;
    try {
      text = await extractor(filePath);
    } catch (error) {
      throw new ExtractionError(filePath, errorMessage(error), error);
    }

    if (text.trim() === '') {
      throw new ExtractionError(filePath, 'no text content found');
    }
    return { kind: format.kind, extension, text };
  }

  // Unknown extensions are accepted when the bytes are readable UTF-8 text.
  private async extractUnknown(filePath: string, extension: string): Promise<ResolvedExtraction> {
    let bytes: Buffer;
    try {
      bytes = await fs.readFile(filePath);
    } catch (error) {
      throw new ExtractionError(filePath, errorMessage(error), error);
    }

    let text: string;
    try {
      text = new TextDecoder('utf-8', { fatal: true }).decode(bytes);
    } catch {
      throw new UnsupportedFileTypeError(extension, this.supportedFormatsDescription());
    }

    if (text.includes('\u0000')) {
      throw new UnsupportedFileTypeError(extension, this.supportedFormatsDescription());
    }
    if (text.trim() === '') {
      throw new ExtractionError(filePath, 'no text content found');
    }
    return { kind: UNKNOWN_TEXT_KIND, extension, text };
  }
}
