export interface Diagnostic {
  code: string;
  message: string;
  data?: Record<string, string | number>;
}
