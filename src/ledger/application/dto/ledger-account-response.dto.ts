export interface LedgerAccountResponseDto {
  address: string;
  balance: string;
  rejectsTransfers: boolean;
}
