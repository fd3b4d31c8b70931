export const AUTH_OPTIONS = "AUTH_OPTIONS";

export interface AuthOptions {
  /** ENABLE_AUTH; when off every route is open and searches are not scoped */
  enabled: boolean;
  secret: string;
}
