export interface NonceResponseDto {
  address: string;
  nonce: string;
  message: string;
  expiresInSeconds: number;
}

export interface LoginResponseDto {
  accessToken: string;
  address: string;
}
