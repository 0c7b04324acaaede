/**
 * Outcome of a NAV SOAP codeunit call.
 */
export interface SoapResult {
  readonly success: boolean;
  /** Informational or error message */
  readonly message?: string;
  /** Text of the `return_value` element, when the call produced one */
  readonly returnValue?: string;
}

export function successResult(returnValue: string): SoapResult {
  return Object.freeze({ success: true, message: 'Success', returnValue });
}

export function failureResult(message: string): SoapResult {
  return Object.freeze({ success: false, message });
}
