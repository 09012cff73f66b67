import { readFileSync } from "node:fs";

export const SYSTEM_PROMPT_NAME = "typhoon_action_guide";
export const SYSTEM_PROMPT_DESCRIPTION = "태풍 대응 행동 가이드 시스템 프롬프트";

const SYSTEM_PROMPT_URL = new URL("../prompts/system_prompt.txt", import.meta.url);

export function loadSystemPrompt(): string {
    return readFileSync(SYSTEM_PROMPT_URL, "utf8").trim();
}
