export interface OriginValidatorPort {
  isAllowed(origin: string): boolean;
}
