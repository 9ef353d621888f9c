export interface FileSearchHit {
  fileId: string;
  filename: string;
  score: number;
  text: string;
  attributes: Record<string, string | number | boolean>;
}

export interface FileSearchAnswer {
  responseId: string;
  model: string;
  outputText: string;
  results: FileSearchHit[];
  raw: unknown; // response exactly as returned by the service, for dumping
}
