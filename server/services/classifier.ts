import type { FattyAcidSubcategory, MarkerCategory } from "@shared/schema";

interface CategoryRule {
  category: MarkerCategory;
  // Matched as lowercase substrings
  keywords: readonly string[];
  // Matched against the name as written
  pattern: RegExp;
}

const ELEMENT_SYMBOLS = ["Mg", "Se", "Zn", "Cu", "Cr", "Pb", "Cd", "Ni", "Hg", "K", "Na", "P", "Mn", "Mo", "Fe"];

// A bare symbol counts only as the whole name or in parentheses, so "Vitamin K" stays a micronutrient
const ELEMENT_SYMBOL_PATTERN = new RegExp(
  `^(?:${ELEMENT_SYMBOLS.join("|")})$|\\((?:${ELEMENT_SYMBOLS.join("|")})\\)`
);

/**
 * Ordered: the first rule with a keyword or pattern hit decides the category,
 * so a name such as "Calcium" resolves to clinical chemistry before metals.
 */
export const CATEGORY_RULES: readonly CategoryRule[] = [
  {
    category: "hematology",
    keywords: ["leukoz", "erythroz", "hämoglobin", "hämatokrit", "mcv", "mch", "mchc", "thromboz", "rdw",
      "neutrophil", "lymphoz", "monoz", "eosinophil", "basophil", "hematocrit", "platelets"],
    pattern: /(leuko|erythro|hb|hct|mcv|mch|mchc|plt|rdw)/i,
  },
  {
    category: "clinical_chemistry",
    keywords: ["ferritin", "gesamteiweiß", "calcium", "protein", "albumin", "glucose", "creatinine", "urea",
      "bilirubin", "ast", "alt"],
    pattern: /(ferritin|protein|calcium|glucose|creatinin|urea)/i,
  },
  {
    category: "hormones",
    keywords: ["t3", "t4", "tsh", "freies", "hormone", "cortisol", "testosterone", "estradiol", "insulin", "dhea"],
    pattern: /(t3|t4|tsh|ft3|ft4|cortisol|testosteron)/i,
  },
  {
    category: "clinical_immunology",
    keywords: ["crp", "immunoglobulin", "igg", "iga", "igm", "ige", "interleukin", "complement", "antibody"],
    pattern: /(crp|ig[agme]|interleukin|complement)/i,
  },
  {
    category: "metals_trace_elements",
    keywords: ["magnesium", "selen", "zink", "kupfer", "chrom", "blei", "cadmium", "nickel", "quecksilber",
      "kalium", "natrium", "phosphor", "phosphat", "mangan", "molybdän", "eisen", "iron", "copper", "zinc"],
    pattern: ELEMENT_SYMBOL_PATTERN,
  },
  {
    category: "micronutrients",
    keywords: ["vitamin", "folsäure", "cobalamin", "holotrans", "biotin", "niacin", "riboflavin", "thiamin",
      "folic acid", "b12"],
    pattern: /(vitamin|vit|folsäure|folate|b12|cobalamin)/i,
  },
  {
    category: "fatty_acids",
    keywords: ["linol", "omega", "epa", "dha", "arachidon", "fettsäuren", "palmitin", "stearin", "fatty acid",
      "lipid"],
    pattern: /(omega|epa|dha|linol|arachidon|fatty|lipid)/i,
  },
  {
    category: "quotients",
    keywords: ["index", "verhältnis", "quotient", "ratio", "aa/epa", "omega-6/omega-3", "ldl/hdl"],
    pattern: /(index|ratio|quotient|verhältnis|\/)/i,
  },
];

export const DEFAULT_CATEGORY: MarkerCategory = "clinical_chemistry";

export function classifyMarker(testName: string): MarkerCategory {
  const lower = testName.toLowerCase();

  for (const rule of CATEGORY_RULES) {
    if (rule.keywords.some((keyword) => lower.includes(keyword)) || rule.pattern.test(testName)) {
      return rule.category;
    }
  }

  return DEFAULT_CATEGORY;
}

export const FATTY_ACID_RULES: ReadonlyArray<{ subcategory: FattyAcidSubcategory; keywords: readonly string[] }> = [
  { subcategory: "omega_3", keywords: ["alpha-linolen", "epa", "dha", "docosapentaen-n3", "omega-3", "omega 3"] },
  {
    subcategory: "omega_6",
    keywords: ["gamma-linolen", "dihomo", "linol", "arachidon", "docosatetraen", "docosapentaen-n6", "omega-6",
      "omega 6"],
  },
  { subcategory: "monounsaturated", keywords: ["olein", "palmitolein", "gondo", "nervon", "einfach ungesättigt"] },
  { subcategory: "trans", keywords: ["trans", "elaidin"] },
  {
    subcategory: "saturated",
    keywords: ["myristin", "palmitin", "stearin", "arachin", "behen", "lignocerin", "gesättigt", "saturated"],
  },
];

export const DEFAULT_FATTY_ACID_SUBCATEGORY: FattyAcidSubcategory = "omega_3";

export function classifyFattyAcid(testName: string): FattyAcidSubcategory {
  const lower = testName.toLowerCase();
  const match = FATTY_ACID_RULES.find((rule) => rule.keywords.some((keyword) => lower.includes(keyword)));
  return match?.subcategory ?? DEFAULT_FATTY_ACID_SUBCATEGORY;
}
