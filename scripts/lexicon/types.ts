export type BuildMode = 'sample' | 'production';

export interface BuildOptions {
  mode: BuildMode;
  force: boolean;
  input?: string;
  outDir?: string;
  languages: string[];
}

export interface ManifestFailure {
  headword: string;
  reason: string;
}

export interface BuildManifest {
  generatedAt: string;
  mode: BuildMode;
  source: string;
  pages: number;
  senses: number;
  json: string;
  jsonSha256: string;
  sqlite: string;
  sqliteSha256: string;
  diagnostics: number;
  failures: ManifestFailure[];
}
