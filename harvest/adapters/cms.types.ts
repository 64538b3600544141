export type RichTextMark = { type: "link"; attrs: { href: string; linktype: "url"; target?: string } };

export type RichTextNode =
  | { type: "doc"; content: RichTextNode[] }
  | { type: "paragraph"; content: RichTextNode[] }
  | { type: "heading"; attrs: { level: number }; content: RichTextNode[] }
  | { type: "text"; text: string; marks?: RichTextMark[] };

export type ParagraphBlock = {
  component: "paragraph";
  _uid: string;
  text: RichTextNode;
};

export type AppStoreBlock = {
  component: "app_store";
  _uid: string;
  type: "custom" | "google" | "apple";
  link: string;
};

export type GridBlock = {
  component: "grid_layout";
  _uid: string;
  layout_type: "grid" | "stack";
  columns?: number;
  gap?: number;
  children: Block[];
};

export type Block = ParagraphBlock | AppStoreBlock | GridBlock;

export type StoryContent = {
  component: string;
  title: string;
  blocks: Block[];
};

export type NewStory = {
  name: string;
  slug: string;
  parentId: number;
  content: StoryContent;
  publish: boolean;
};

export type CmsStory = { id: number; name: string; slug: string };

export interface CmsClient {
  /** Resolves (creating as needed) a nested folder path and returns the innermost folder id. */
  ensureFolderPath(parts: readonly string[]): Promise<number>;
  createStory(input: NewStory): Promise<CmsStory>;
}
