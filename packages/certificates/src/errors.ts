/**
 * @popchain/certificates: Errors.
 */

export type CertificateErrorCode =
  | "INVALID_ADDRESS"
  | "UNAUTHORIZED"
  | "LENGTH_MISMATCH"
  | "ENCODING_FAILURE"
  | "INVALID_PRICE";

export class CertificateError extends Error {
  public readonly code: CertificateErrorCode;

  constructor(code: CertificateErrorCode, message: string) {
    super(message);
    this.name = "CertificateError";
    this.code = code;
  }
}
