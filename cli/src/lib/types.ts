export interface MetadataResult {
  filename: string;
  size_bytes: number;
  page_count: number;
  parsed: Record<string, string>;
  raw_info: string;
  xmp_xml: string | null;
}

export interface MetadataSuccess {
  ok: true;
  result: MetadataResult;
}

export interface MetadataFailure {
  error: string;
}
