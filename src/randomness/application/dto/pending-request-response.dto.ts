export interface PendingRequestResponseDto {
  requestId: string;
  keyHash: string;
  subscriptionId: string;
  requestConfirmations: number;
  callbackGasLimit: number;
  numWords: number;
  nativePayment: boolean;
  requestedAt: string;
}
