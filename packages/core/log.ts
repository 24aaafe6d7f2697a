import { consola } from "consola"
import { LOG_TAG } from "@/constants"

export const logger = consola.withTag(LOG_TAG)
