export interface NoteSection {
  title: string;
  level: number;
  entries: string[];
}
