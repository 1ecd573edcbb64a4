export const CATEGORIES = [
  // names
  "PERSON",
  "PATIENT_NAME",
  // contact
  "EMAIL_ADDRESS",
  "PHONE_NUMBER",
  "FAX_NUMBER",
  "URL",
  "IP_ADDRESS",
  // location
  "LOCATION",
  "STREET_ADDRESS",
  "ZIP_CODE",
  "ORGANIZATION",
  "FACILITY",
  // dates & ages
  "DATE",
  "DATE_OF_BIRTH",
  "ADMISSION_DATE",
  "DISCHARGE_DATE",
  "DEATH_DATE",
  "TIME",
  "AGE",
  "AGE_OVER_89",
  // financial
  "CREDIT_CARD",
  "IBAN_CODE",
  "ACCOUNT_NUMBER",
  "ROUTING_NUMBER",
  "SWIFT_CODE",
  // government ids
  "SSN",
  "US_PASSPORT",
  "US_DRIVER_LICENSE",
  "TAX_ID",
  "NATIONAL_ID",
  // medical
  "MEDICAL_RECORD_NUMBER",
  "HEALTH_PLAN_NUMBER",
  "PRESCRIPTION_NUMBER",
  "NPI_NUMBER",
  "DEA_NUMBER",
  "MEDICAL_LICENSE",
  // biometric
  "BIOMETRIC_ID",
  "GENETIC_MARKER",
  // vehicles & devices
  "VIN",
  "LICENSE_PLATE",
  "DEVICE_ID",
  "MAC_ADDRESS",
  "IMEI",
  // certificates & licenses
  "CERTIFICATE_NUMBER",
  "LICENSE_NUMBER",
  // sensitive personal data
  "GENDER",
  "DEMOGRAPHIC",
  // credentials
  "CRYPTO_WALLET",
  "API_KEY",
  "PASSWORD",
  "ACCESS_TOKEN",
  // anything else an NER model reports
  "OTHER",
] as const;

export type Category = (typeof CATEGORIES)[number];

const CATEGORY_SET: ReadonlySet<string> = new Set(CATEGORIES);

export function isCategory(value: string): value is Category {
  return CATEGORY_SET.has(value);
}

export const COMPLIANCE_CLASSES = ["hipaa", "iso27001", "soc2"] as const;

export type ComplianceClass = (typeof COMPLIANCE_CLASSES)[number];

/** Which layer produced a span, highest priority first. */
export const DETECTION_METHODS = ["ml_model", "custom_recognizer", "fallback_regex"] as const;

export type DetectionMethod = (typeof DETECTION_METHODS)[number];

export const METHOD_PRIORITY: Record<DetectionMethod, number> = {
  ml_model: 3,
  custom_recognizer: 2,
  fallback_regex: 1,
};

/** Token used for any category the catalog does not know. */
export const DEFAULT_TOKEN = "entity";
