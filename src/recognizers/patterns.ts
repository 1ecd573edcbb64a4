import type { Category } from "../types/categories";

/**
 * One regex-based detection rule.
 *
 * A named group `value` narrows the reported span to the sensitive part of the match,
 * e.g. `DOB: 05/15/1980` reports `05/15/1980` only.
 */
export interface PatternDefinition {
  readonly name: string;
  readonly category: Category;
  readonly regex: RegExp;
  readonly score: number;
  /** Keywords that raise the score when they precede the match (pattern recognizer only). */
  readonly context: readonly string[];
  /** Rejects a match, e.g. a card number failing the Luhn check. */
  readonly validate?: (value: string) => boolean;
  /** Picks the final category from the matched value. */
  readonly classify?: (value: string) => Category;
}

type PatternInit = Omit<PatternDefinition, "context"> & { context?: readonly string[] };

/** Normalizes flags: matchAll needs `g`, group offsets need `d`. */
export function definePattern(init: PatternInit): PatternDefinition {
  const flags = Array.from(new Set(`${init.regex.flags}gd`)).join("");
  return Object.freeze({
    ...init,
    context: init.context ?? [],
    regex: new RegExp(init.regex.source, flags),
  });
}

// ---- value rules ----

/** Ages strictly above this are a HIPAA identifier on their own. */
export const AGE_OVER_89_THRESHOLD = 89;

export function ageCategory(value: string): Category {
  const age = Number.parseInt(value, 10);
  return Number.isFinite(age) && age > AGE_OVER_89_THRESHOLD ? "AGE_OVER_89" : "AGE";
}

export function luhnValid(raw: string): boolean {
  const digits = raw.replace(/[\s-]+/g, "");
  if (!/^\d{12,19}$/.test(digits)) return false;
  let sum = 0;
  let double = false;
  for (let i = digits.length - 1; i >= 0; i--) {
    let d = Number(digits[i]);
    if (double) {
      d *= 2;
      if (d > 9) d -= 9;
    }
    sum += d;
    double = !double;
  }
  return sum % 10 === 0;
}

// ---- shared fragments ----

const NUM_SUFFIX = String.raw`(?:\s+(?:number|no\.?|id|#))?`;
const PHONE = String.raw`(?:\+\d{1,3}[-.\s]?)?(?:\(\d{3}\)\s?|\b\d{3}[-.\s]?)\d{3}[-.\s]?\d{4}\b`;
const BIRTH_DATE = String.raw`\d{1,2}[/-]\d{1,2}[/-]\d{2,4}|\d{4}[/-]\d{1,2}[/-]\d{1,2}`;
const DATE_US = String.raw`(?:0?[1-9]|1[0-2])[/-](?:0?[1-9]|[12]\d|3[01])[/-](?:19|20)?\d{2}`;
const DATE_ISO = String.raw`(?:19|20)\d{2}[/-](?:0?[1-9]|1[0-2])[/-](?:0?[1-9]|[12]\d|3[01])`;
const CALENDAR_DATE = `${DATE_US}|${DATE_ISO}`;
// starts only where a local-part run starts; every run is bounded
const EMAIL = String.raw`(?<![A-Z0-9._%+-])[A-Z0-9._%+-]{1,64}@[A-Z0-9.-]{1,253}\.[A-Z]{2,24}\b`;

/**
 * Context-aware recognizers for HIPAA identifiers, ISO 27001 personal data
 * and SOC 2 financial/credential data.
 */
export const CUSTOM_PATTERNS: readonly PatternDefinition[] = [
  // names introduced by a label or an honorific
  definePattern({
    name: "labeled_person",
    category: "PERSON",
    regex: /\b(?:[Pp]atient|[Nn]ame|Mr|Mrs|Ms|Dr)\.?:?[ \t]+(?<value>[A-Z][a-z]+(?:[ '-][A-Z][a-z]+){0,2})\b/,
    score: 0.6,
    context: ["patient", "name", "client", "member"],
  }),
  definePattern({
    name: "email",
    category: "EMAIL_ADDRESS",
    regex: new RegExp(EMAIL, "i"),
    score: 0.9,
    context: ["email", "e-mail", "mail", "contact"],
  }),
  definePattern({
    name: "fax",
    category: "FAX_NUMBER",
    regex: new RegExp(String.raw`\bfax(?:\s+number)?[\s#:]*(?<value>${PHONE})`, "i"),
    score: 0.85,
    context: ["fax"],
  }),
  definePattern({
    name: "phone",
    category: "PHONE_NUMBER",
    regex: new RegExp(PHONE),
    score: 0.5,
    context: ["phone", "tel", "telephone", "call", "mobile", "cell", "contact"],
  }),
  definePattern({
    name: "url",
    category: "URL",
    regex: /\bhttps?:\/\/[^\s<>"']+/i,
    score: 0.6,
    context: ["url", "website", "site", "link", "portal"],
  }),
  definePattern({
    name: "ipv4",
    category: "IP_ADDRESS",
    regex: /\b(?:(?:25[0-5]|2[0-4]\d|1?\d?\d)\.){3}(?:25[0-5]|2[0-4]\d|1?\d?\d)\b/,
    score: 0.6,
    context: ["ip", "address", "host", "server", "client"],
  }),
  definePattern({
    name: "street_address",
    category: "STREET_ADDRESS",
    regex: /\b\d{1,5}\s+(?:[A-Z][a-z]+\s){1,4}(?:Street|St|Avenue|Ave|Road|Rd|Boulevard|Blvd|Lane|Ln|Drive|Dr|Court|Ct|Way)\b\.?/,
    score: 0.6,
    context: ["address", "lives", "resides", "located", "residence"],
  }),
  definePattern({
    name: "zip_code",
    category: "ZIP_CODE",
    regex: /\b(?:zip|zip code|postal code)[\s#:]*(?<value>\d{5}(?:-\d{4})?)\b/i,
    score: 0.8,
    context: ["zip", "postal"],
  }),
  definePattern({
    name: "date_of_birth",
    category: "DATE_OF_BIRTH",
    regex: new RegExp(String.raw`\b(?:dob|d\.o\.b\.|date of birth|birth ?date|born(?: on)?)[\s:]*(?<value>${BIRTH_DATE})\b`, "i"),
    score: 0.85,
    context: ["born", "dob", "birth", "birthday"],
  }),
  definePattern({
    name: "admission_date",
    category: "ADMISSION_DATE",
    regex: new RegExp(String.raw`\b(?:admitted|admission(?: date)?|admit date)(?: on)?[\s:]*(?<value>${CALENDAR_DATE})\b`, "i"),
    score: 0.85,
    context: ["admitted", "admission", "admit"],
  }),
  definePattern({
    name: "discharge_date",
    category: "DISCHARGE_DATE",
    regex: new RegExp(String.raw`\b(?:discharged|discharge(?: date)?)(?: on)?[\s:]*(?<value>${CALENDAR_DATE})\b`, "i"),
    score: 0.85,
    context: ["discharged", "discharge"],
  }),
  definePattern({
    name: "death_date",
    category: "DEATH_DATE",
    regex: new RegExp(String.raw`\b(?:died|deceased|expired|date of death|death date|dod)(?: on)?[\s:]*(?<value>${CALENDAR_DATE})\b`, "i"),
    score: 0.85,
    context: ["died", "deceased", "death", "dod"],
  }),
  // any other calendar date
  definePattern({
    name: "calendar_date",
    category: "DATE",
    regex: new RegExp(String.raw`\b(?:${CALENDAR_DATE})\b`),
    score: 0.6,
    context: ["date", "admitted", "discharged", "died", "visit", "appointment"],
  }),
  definePattern({
    name: "age_labeled",
    category: "AGE",
    regex: /\b(?:age|aged)[\s:]*(?<value>\d{1,3})\b/i,
    score: 0.7,
    context: ["age", "aged"],
    classify: ageCategory,
  }),
  definePattern({
    name: "age_years_old",
    category: "AGE",
    regex: /\b(?<value>\d{1,3})[\s-]*(?:years?[\s-]old|y\/o|yo)\b/i,
    score: 0.6,
    context: ["patient", "age", "aged", "is a"],
    classify: ageCategory,
  }),
  definePattern({
    name: "credit_card",
    category: "CREDIT_CARD",
    regex: /\b(?:\d{4}[-\s]?){3}\d{4}\b/,
    score: 0.6,
    context: ["card", "credit", "debit", "visa", "mastercard", "amex", "payment"],
    validate: luhnValid,
  }),
  definePattern({
    name: "iban",
    category: "IBAN_CODE",
    regex: /\b[A-Z]{2}\d{2}(?:\s?[A-Z0-9]{4}){2,7}(?:\s?[A-Z0-9]{1,4})?\b/,
    score: 0.5,
    context: ["iban", "bank", "account", "transfer"],
  }),
  definePattern({
    name: "account_number",
    category: "ACCOUNT_NUMBER",
    regex: new RegExp(String.raw`\b(?:account|acct|acc)${NUM_SUFFIX}[\s#:]*\d{6,17}\b`, "i"),
    score: 0.8,
    context: ["account", "acct", "bank", "financial", "checking", "savings"],
  }),
  definePattern({
    name: "routing_number",
    category: "ROUTING_NUMBER",
    regex: new RegExp(String.raw`\b(?:routing|aba|rtn)${NUM_SUFFIX}[\s#:]*(?<value>\d{9})\b`, "i"),
    score: 0.85,
    context: ["routing", "aba", "bank", "wire"],
  }),
  definePattern({
    name: "swift_code",
    category: "SWIFT_CODE",
    regex: /\b(?:SWIFT|BIC|[Ss]wift|[Bb]ic)(?:\s+[Cc]ode)?[\s#:]*(?<value>[A-Z]{6}[A-Z0-9]{2}(?:[A-Z0-9]{3})?)\b/,
    score: 0.8,
    context: ["swift", "bic", "bank", "wire"],
  }),
  definePattern({
    name: "ssn",
    category: "SSN",
    regex: /\b\d{3}-\d{2}-\d{4}\b/,
    score: 0.6,
    context: ["ssn", "social security", "social"],
  }),
  definePattern({
    name: "passport",
    category: "US_PASSPORT",
    regex: new RegExp(String.raw`\bpassport${NUM_SUFFIX}[\s#:]*(?<value>[A-Z0-9]{6,9})\b`, "i"),
    score: 0.8,
    context: ["passport", "travel"],
  }),
  definePattern({
    name: "driver_license",
    category: "US_DRIVER_LICENSE",
    regex: new RegExp(String.raw`\b(?:driver'?s?[ -]licen[cs]e|DL)${NUM_SUFFIX}[\s#:]*(?<value>(?=[A-Z]*\d)[A-Z0-9]{5,15})\b`, "i"),
    score: 0.8,
    context: ["driver", "license", "licence", "dl"],
  }),
  definePattern({
    name: "tax_id",
    category: "TAX_ID",
    regex: /\b(?:EIN|TIN|ITIN|tax id)[\s#:]*(?<value>\d{2}-\d{7}|9\d{2}-\d{2}-\d{4}|\d{9})\b/i,
    score: 0.8,
    context: ["tax", "ein", "tin", "employer"],
  }),
  definePattern({
    name: "medical_record_number",
    category: "MEDICAL_RECORD_NUMBER",
    regex: /\b(?:MRN|medical record(?: number)?|patient id)[\s#:]*(?=[A-Z]*\d)[A-Z0-9]{6,12}\b/i,
    score: 0.85,
    context: ["medical record", "mrn", "patient id", "patient number", "chart"],
  }),
  definePattern({
    name: "health_plan_number",
    category: "HEALTH_PLAN_NUMBER",
    regex: /\b(?:health plan|insurance|policy|member(?: id)?|subscriber(?: id)?)[\s#:]*(?=[A-Z]*\d)[A-Z0-9]{6,20}\b/i,
    score: 0.8,
    context: ["insurance", "health plan", "policy", "member", "subscriber", "beneficiary"],
  }),
  definePattern({
    name: "prescription_number",
    category: "PRESCRIPTION_NUMBER",
    regex: new RegExp(String.raw`\b(?:rx|prescription)${NUM_SUFFIX}[\s#:]*\d{6,12}\b`, "i"),
    score: 0.8,
    context: ["rx", "prescription", "pharmacy", "refill"],
  }),
  definePattern({
    name: "npi_number",
    category: "NPI_NUMBER",
    regex: /\bNPI[\s#:]*(?<value>\d{10})\b/i,
    score: 0.85,
    context: ["npi", "provider"],
  }),
  definePattern({
    name: "dea_number",
    category: "DEA_NUMBER",
    regex: /\bDEA[\s#:]*(?<value>[A-Z]{2}\d{7})\b/i,
    score: 0.85,
    context: ["dea", "prescriber"],
  }),
  definePattern({
    name: "biometric_id",
    category: "BIOMETRIC_ID",
    regex: /\b(?:fingerprint|retina|iris|facial|biometric)(?:\s+(?:id|scan|recognition))?[\s#:]*(?=[A-Z]*\d)[A-Z0-9]{8,}\b/i,
    score: 0.8,
    context: ["fingerprint", "retina", "iris", "facial", "biometric"],
  }),
  definePattern({
    name: "genetic_marker",
    category: "GENETIC_MARKER",
    regex: /\b(?:DNA|genetic|genome)(?:\s+(?:sample|id|marker))?[\s#:]*(?=[A-Z]*\d)[A-Z0-9]{8,}\b/i,
    score: 0.8,
    context: ["dna", "genetic", "genome", "sample"],
  }),
  definePattern({
    name: "vin",
    category: "VIN",
    regex: /\b(?=[A-HJ-NPR-Z]*\d)[A-HJ-NPR-Z0-9]{17}\b/,
    score: 0.5,
    context: ["vin", "vehicle", "car", "automobile"],
  }),
  definePattern({
    name: "license_plate",
    category: "LICENSE_PLATE",
    regex: new RegExp(String.raw`\b(?:license plate|plate)${NUM_SUFFIX}[\s#:]*(?<value>(?=[A-Z-]*\d)[A-Z0-9-]{2,8})\b`, "i"),
    score: 0.8,
    context: ["plate", "vehicle", "registration"],
  }),
  definePattern({
    name: "imei",
    category: "IMEI",
    regex: /\b(?:IMEI|MEID)[\s#:]*(?<value>\d{15})\b/i,
    score: 0.9,
    context: ["imei", "meid", "phone", "device"],
  }),
  definePattern({
    name: "device_id",
    category: "DEVICE_ID",
    regex: /\b(?:device|serial|IMEI|MEID)(?:\s+(?:number|no\.?|id))?[\s#:]*(?=[A-Z]*\d)[A-Z0-9]{8,20}\b/i,
    score: 0.8,
    context: ["device", "serial", "imei", "equipment", "implant"],
  }),
  definePattern({
    name: "mac_address",
    category: "MAC_ADDRESS",
    regex: /\b(?:[0-9A-F]{2}[:-]){5}[0-9A-F]{2}\b/i,
    score: 0.8,
    context: ["mac", "hardware", "address"],
  }),
  definePattern({
    name: "certificate_number",
    category: "CERTIFICATE_NUMBER",
    regex: new RegExp(String.raw`\b(?:cert|certificate)${NUM_SUFFIX}[\s#:]*(?=[A-Z]*\d)[A-Z0-9]{6,15}\b`, "i"),
    score: 0.8,
    context: ["certificate", "cert", "certification"],
  }),
  definePattern({
    name: "license_number",
    category: "LICENSE_NUMBER",
    regex: new RegExp(String.raw`\b(?:license|licence|lic)${NUM_SUFFIX}[\s#:]*(?=[A-Z]*\d)[A-Z0-9]{6,15}\b`, "i"),
    score: 0.75,
    context: ["license", "licence", "professional"],
  }),
  definePattern({
    name: "gender",
    category: "GENDER",
    regex: /\b(?:gender|sex)[\s:]*(?<value>male|female|non-binary|transgender|intersex|other|M|F|X)\b/i,
    score: 0.75,
    context: ["gender", "sex", "identify as"],
  }),
  definePattern({
    name: "crypto_wallet",
    category: "CRYPTO_WALLET",
    regex: /\b(?:0x[a-fA-F0-9]{40}|bc1[a-z0-9]{39,59})\b/,
    score: 0.8,
    context: ["wallet", "bitcoin", "ethereum", "crypto", "address"],
  }),
  definePattern({
    name: "api_key",
    category: "API_KEY",
    regex: /\b(?:api[\s_-]?key|apikey|secret[\s_-]?key)[\s:=]*['"]?[A-Za-z0-9_-]{20,}/i,
    score: 0.85,
    context: ["api", "key", "secret", "credential"],
  }),
  definePattern({
    name: "access_token",
    category: "ACCESS_TOKEN",
    regex: /\b(?:access[\s_-]?token|auth[\s_-]?token|bearer)[\s:=]*['"]?(?<value>[A-Za-z0-9_\-.~+/]{20,}=*)/i,
    score: 0.85,
    context: ["token", "authorization", "bearer", "credential"],
  }),
  definePattern({
    name: "password",
    category: "PASSWORD",
    regex: /\b(?:password|passwd|pwd)[\s:=]+['"]?(?<value>[^\s'"]{8,})/i,
    score: 0.8,
    context: ["password", "login", "credential"],
  }),
];

/**
 * Strict patterns used without any context. They overlap the custom set on purpose:
 * a process that lost every other layer still redacts these.
 */
export const FALLBACK_PATTERNS: readonly PatternDefinition[] = [
  // HIPAA critical (0.8)
  definePattern({ name: "ssn", category: "SSN", regex: /\b\d{3}-\d{2}-\d{4}\b/, score: 0.8 }),
  definePattern({
    name: "medical_record_number",
    category: "MEDICAL_RECORD_NUMBER",
    regex: /\b(?:MRN|medical record|patient id)[\s#:]*(?=[A-Z]*\d)[A-Z0-9]{6,12}\b/i,
    score: 0.8,
  }),
  definePattern({
    name: "health_plan_number",
    category: "HEALTH_PLAN_NUMBER",
    regex: /\b(?:health plan|insurance|policy)[\s#:]*(?=[A-Z]*\d)[A-Z0-9]{6,20}\b/i,
    score: 0.8,
  }),
  definePattern({
    name: "date_of_birth",
    category: "DATE_OF_BIRTH",
    regex: new RegExp(String.raw`\b(?:dob|date of birth|birth date|born)[\s:]*(?<value>${BIRTH_DATE})\b`, "i"),
    score: 0.8,
  }),
  definePattern({ name: "date_us", category: "DATE", regex: new RegExp(String.raw`\b(?:${DATE_US})\b`), score: 0.5 }),
  definePattern({ name: "date_iso", category: "DATE", regex: new RegExp(String.raw`\b(?:${DATE_ISO})\b`), score: 0.5 }),
  definePattern({
    name: "age",
    category: "AGE",
    regex: /\b(?:age|aged)[\s:]*(?<value>\d{1,3})\b/i,
    score: 0.8,
    classify: ageCategory,
  }),
  // SOC 2 critical (0.75)
  definePattern({ name: "credit_card", category: "CREDIT_CARD", regex: /\b\d{4}[-\s]?\d{4}[-\s]?\d{4}[-\s]?\d{4}\b/, score: 0.75 }),
  definePattern({
    name: "api_key",
    category: "API_KEY",
    regex: /\b(?:api[_-]?key|apikey|access[_-]?token)[\s:=]*['"]?[A-Za-z0-9_-]{20,}/i,
    score: 0.75,
  }),
  definePattern({
    name: "password",
    category: "PASSWORD",
    regex: /\b(?:password|passwd|pwd)[\s:=]*['"]?(?<value>[^\s'"]{8,})/i,
    score: 0.75,
  }),
  // everything else (0.5)
  definePattern({ name: "email", category: "EMAIL_ADDRESS", regex: new RegExp(EMAIL, "i"), score: 0.5 }),
  definePattern({
    name: "phone",
    category: "PHONE_NUMBER",
    regex: /(?:\+\d{1,3}[-.\s]?)?(?:\(\d{3}\)\s?|\b\d{3}[-.\s]?)\d{3}[-.\s]?\d{4}\b/,
    score: 0.5,
  }),
  definePattern({ name: "url", category: "URL", regex: /https?:\/\/[^\s]+/, score: 0.5 }),
  definePattern({ name: "ip_address", category: "IP_ADDRESS", regex: /\b(?:\d{1,3}\.){3}\d{1,3}\b/, score: 0.5 }),
  definePattern({ name: "iban", category: "IBAN_CODE", regex: /\b[A-Z]{2}\d{2}[A-Z0-9]{11,30}\b/, score: 0.5 }),
  definePattern({ name: "account_number", category: "ACCOUNT_NUMBER", regex: /\b(?:account|acct|acc)[\s#:]*\d{6,17}\b/i, score: 0.5 }),
  definePattern({
    name: "routing_number",
    category: "ROUTING_NUMBER",
    regex: /\b(?:routing|aba|rtn)(?:\s+number)?[\s#:]*(?<value>\d{9})\b/i,
    score: 0.5,
  }),
  definePattern({ name: "us_passport", category: "US_PASSPORT", regex: /\b[A-Z]{1,2}\d{6,9}\b/, score: 0.5 }),
  definePattern({ name: "prescription_number", category: "PRESCRIPTION_NUMBER", regex: /\b(?:rx|prescription)[\s#:]*\d{6,12}\b/i, score: 0.5 }),
  definePattern({ name: "npi_number", category: "NPI_NUMBER", regex: /\bNPI[\s#:]*(?<value>\d{10})\b/i, score: 0.5 }),
  definePattern({
    name: "biometric_id",
    category: "BIOMETRIC_ID",
    regex: /\b(?:fingerprint|retina|iris|facial|biometric)[\s#:]*(?=[A-Z]*\d)[A-Z0-9]{8,}\b/i,
    score: 0.5,
  }),
  definePattern({
    name: "genetic_marker",
    category: "GENETIC_MARKER",
    regex: /\b(?:DNA|genetic|genome)[\s#:]*(?=[A-Z]*\d)[A-Z0-9]{8,}\b/i,
    score: 0.5,
  }),
  definePattern({ name: "vin", category: "VIN", regex: /\b(?=[A-HJ-NPR-Z]*\d)[A-HJ-NPR-Z0-9]{17}\b/, score: 0.5 }),
  definePattern({
    name: "device_id",
    category: "DEVICE_ID",
    regex: /\b(?:device|serial|imei)[\s#:]*(?=[A-Z]*\d)[A-Z0-9]{8,}\b/i,
    score: 0.5,
  }),
  definePattern({ name: "mac_address", category: "MAC_ADDRESS", regex: /\b(?:[0-9A-Fa-f]{2}[:-]){5}[0-9A-Fa-f]{2}\b/, score: 0.5 }),
  definePattern({
    name: "certificate_number",
    category: "CERTIFICATE_NUMBER",
    regex: /\b(?:cert|certificate)[\s#:]*(?=[A-Z]*\d)[A-Z0-9]{6,15}\b/i,
    score: 0.5,
  }),
  definePattern({
    name: "license_number",
    category: "LICENSE_NUMBER",
    regex: /\b(?:license|lic)[\s#:]*(?=[A-Z]*\d)[A-Z0-9]{6,15}\b/i,
    score: 0.5,
  }),
  definePattern({
    name: "crypto_wallet",
    category: "CRYPTO_WALLET",
    regex: /\b(?:0x[a-fA-F0-9]{40}|[13][a-km-zA-HJ-NP-Z1-9]{25,34}|bc1[a-z0-9]{39,59})\b/,
    score: 0.5,
  }),
  definePattern({
    name: "gender",
    category: "GENDER",
    regex: /\b(?:gender|sex)[\s:]*(?<value>male|female|non-binary|transgender|intersex|other)\b/i,
    score: 0.5,
  }),
];
