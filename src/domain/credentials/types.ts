export interface CachedCredential {
  token: string;
  refreshToken?: string;
  /** Epoch ms. */
  expiresAt: number;
  /** Epoch ms. */
  fetchedAt: number;
}

export interface EndpointCandidate {
  url: string;
  lastKnownHealthy: boolean;
}

/** Body of `GET /devices/{id}/token`. */
export interface TokenResponse {
  accessToken: string;
  refreshToken?: string;
  expiresIn: number;
  expiresAt: string;
}

export interface StoreCredentialRequest {
  accessToken: string;
  refreshToken?: string;
  expiresIn: number;
}
