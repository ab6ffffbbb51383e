import type { DrugRuleTable } from "../types";
import { codeine, fluoxetine, paroxetine, risperidone } from "./cyp2d6";
import { ibuprofen, warfarin } from "./cyp2c9";
import { clopidogrel, omeprazole } from "./cyp2c19";
import { simvastatin } from "./slco1b1";
import { azathioprine } from "./tpmt";
import { fluorouracil } from "./dpyd";

export const RULE_TABLES: Readonly<Record<string, DrugRuleTable>> = Object.freeze(
    Object.fromEntries(
        [
            codeine, fluoxetine, paroxetine, risperidone,
            warfarin, ibuprofen,
            clopidogrel, omeprazole,
            simvastatin,
            azathioprine,
            fluorouracil,
        ].map((t) => [t.drug, t]),
    ),
);
