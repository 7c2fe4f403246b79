export interface RootResponse {
  name: string;
  status: 'ok';
}

export interface DiagnosticsResponse {
  backend: string;
  database: string;
  database_url: string;
  database_name: string;
  connection_status: 'Connected' | 'Not Connected';
  collections: string[];
}
