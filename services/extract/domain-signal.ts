const DOMAIN_KEYWORDS = [
  "drg",
  "hospital",
  "provider",
  "clinic",
  "rating",
  "rated",
  "cost",
  "price",
  "cheap",
  "expensive",
  "afford",
  "charge",
  "payment",
  "procedure",
  "surgery",
  "treatment",
  "medical",
  "medicare",
  "near",
  "zip",
];

/** True when the question mentions hospital price, quality or procedures at all. */
export function hasDomainSignal(question: string): boolean {
  const q = question.toLowerCase();
  return DOMAIN_KEYWORDS.some((k) => q.includes(k));
}
