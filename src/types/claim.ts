export interface ClaimRequest {
  /** Requester's network identity, usually the client IP. */
  identity: string;
  destinationAddress: string;
  requestedAmount: bigint;
}

export type ClaimState =
  | "Received"
  | "AddressValidated"
  | "GuardChecked"
  | "WalletLockAcquired"
  | "UtxosFetched"
  | "Selected"
  | "Assembled"
  | "Signed"
  | "Submitted"
  | "Succeeded"
  | "Failed";

export type ClaimFailure =
  | { reason: "InvalidAddress" }
  | { reason: "RateLimited" }
  | { reason: "Cancelled" }
  | { reason: "InsufficientFunds"; have: bigint; need: bigint }
  | { reason: "SigningFailure"; message: string }
  | { reason: "SubmissionFailure"; message: string }
  | { reason: "NodeUnavailable"; message: string };

export interface ClaimSuccess {
  success: true;
  transactionId: string;
  destinationAddress: string;
  amount: bigint;
  nextClaimSeconds: number;
}

export type ClaimOutcome = ClaimSuccess | { success: false; failure: ClaimFailure };

export interface FaucetStatus {
  active: boolean;
  faucetAddress: string;
  balance: bigint;
  nextClaimSeconds: number;
}
