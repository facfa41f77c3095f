import { CollaboratorError } from "../errors";
import type { ChatClient } from "./chat-client";

/** Produces contract source from a natural-language request. */
export interface ContractGenerator {
  generate(prompt: string): Promise<string>;
}

const GENERATOR_SYSTEM = `You write smart contracts in a restricted dispatch-based contract language.

Rules:
- Exactly one entry function that takes the input record \`in\` and returns an output record.
- Dispatch on \`in.functionName == "<name>"\` with one \`if\` per function.
- Use only the state, fund and authorization primitives of the platform (load_*_state, save_*_state, send_funds, get_contract_balance, is_owner, set_*_return, get_*_from_params).
- Check authorization before moving funds or changing owner/admin state.
- Update state before transferring funds.

Reply with the contract only, between [CONTRACT START] and [CONTRACT END].`;

const MARKED = /\[CONTRACT START\]([\s\S]*?)\[CONTRACT END\]/;
const FENCED = /```[A-Za-z+]*[ \t]*\r?\n([\s\S]*?)```/g;

/**
 * Pull the contract out of a model reply: the marked section, else the longest
 * fenced block, else the whole reply when it looks like code.
 */
export function extractContractCode(reply: string): string | null {
  const marked = MARKED.exec(reply);
  if (marked) {
    const inner = stripFences(marked[1]).trim();
    return inner.length > 0 ? inner : null;
  }

  let best: string | null = null;
  for (const m of reply.matchAll(FENCED)) {
    const body = m[1].trim();
    if (body.length > 0 && (best === null || body.length > best.length)) best = body;
  }
  if (best) return best;

  const trimmed = reply.trim();
  return trimmed.includes("{") && trimmed.includes("}") ? trimmed : null;
}

function stripFences(text: string): string {
  return text.replace(/^\s*```[A-Za-z+]*[ \t]*\r?\n?/, "").replace(/\r?\n?```\s*$/, "");
}

export class ChatContractGenerator implements ContractGenerator {
  constructor(private readonly client: ChatClient) {}

  async generate(prompt: string): Promise<string> {
    const reply = await this.client.complete([
      { role: "system", content: GENERATOR_SYSTEM },
      { role: "user", content: `USER REQUEST: ${prompt}` },
    ]);
    const code = extractContractCode(reply);
    if (!code) {
      throw new CollaboratorError("generator reply did not contain contract source");
    }
    return code;
  }
}
