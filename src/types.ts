export type MacroTable = ReadonlyMap<string, number>;

export type KeyAssignment = {
  name: string;
  key: string;
  alt: boolean;
};

export type KeyMap = readonly KeyAssignment[];

export type Keybinding = {
  key: string;
  command: 'editor.action.insertSnippet';
  when: string;
  args: { snippet: string };
};

export type SnippetEntry = {
  prefix: string;
  body: string[];
  description: string;
};

export type SnippetTable = Record<string, SnippetEntry>;

export type PlaceholderLabels = {
  corrected: string;
  comment: string;
  argument: (index: number) => string;
};
