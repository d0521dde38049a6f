export interface DocumentLink {
  text: string;
  href: string;
  title: string;
}

export interface DocumentImage {
  src: string;
  alt: string;
  title: string;
}

export type HeadingLevel = 'h1' | 'h2' | 'h3' | 'h4' | 'h5' | 'h6';

export interface DocumentTable {
  headers: string[];
  rows: string[][];
}

export interface FormInput {
  name: string;
  type: string;
  placeholder: string;
  required: boolean;
}

export interface DocumentForm {
  action: string;
  method: string;
  inputs: FormInput[];
}

export interface DocumentList {
  type: 'ul' | 'ol';
  items: string[];
}

export interface NormalizedDocument {
  url: string;
  title: string;
  text: string;
  meta: Record<string, string>;
  links: DocumentLink[];
  images: DocumentImage[];
  headings: Record<HeadingLevel, string[]>;
  tables: DocumentTable[];
  forms: DocumentForm[];
  lists: DocumentList[];
}
