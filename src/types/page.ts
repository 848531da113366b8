export interface AutoSelectors {
  title: string[];
  content: string[];
  links: string[];
  images: string[];
  metadata: string[];
}

export interface LinkData {
  text: string;
  href: string;
  isExternal: boolean;
}

export interface ImageData {
  src: string;
  alt?: string;
  title?: string;
}

export interface DetectedContent {
  title?: string;
  content: string[];
  links: LinkData[];
  images: ImageData[];
  metadata: Record<string, string>;
}
