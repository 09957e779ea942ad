import type {
  AgentMessageTurn,
  AgentToolCallTurn,
  ToolResultTurn,
  Trajectory,
  Turn,
} from "../types.js";

export function agentMessages(turns: readonly Turn[]): AgentMessageTurn[] {
  return turns.filter((turn): turn is AgentMessageTurn => turn.type === "agent_message");
}

export function toolCalls(turns: readonly Turn[]): AgentToolCallTurn[] {
  return turns.filter((turn): turn is AgentToolCallTurn => turn.type === "agent_tool_call");
}

export function toolResults(turns: readonly Turn[]): ToolResultTurn[] {
  return turns.filter((turn): turn is ToolResultTurn => turn.type === "tool_result");
}

export function finalAgentMessage(turns: readonly Turn[]): AgentMessageTurn | undefined {
  return agentMessages(turns).at(-1);
}

/** Index of the first successful result for `toolName`, or -1. */
export function firstSuccessfulResultIndex(turns: readonly Turn[], toolName: string): number {
  const hit = toolResults(turns).find((turn) => turn.toolName === toolName && turn.status === "ok");
  return hit ? hit.index : -1;
}

function stringifyPayload(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

/** Plain-text transcript for judge prompts. Tool traffic is included unless `userView` is set. */
export function renderTranscript(
  turns: readonly Turn[],
  { userView = false }: { userView?: boolean } = {},
): string {
  const lines: string[] = [];
  for (const turn of turns) {
    switch (turn.type) {
      case "user_utterance":
        lines.push(`[${turn.index}] USER: ${turn.text}`);
        break;
      case "agent_message":
        lines.push(`[${turn.index}] ASSISTANT: ${turn.text}`);
        break;
      case "agent_tool_call":
        if (!userView) {
          lines.push(
            `[${turn.index}] ASSISTANT CALLS ${turn.toolName}(${stringifyPayload(turn.arguments)})`,
          );
        }
        break;
      case "tool_result":
        if (!userView) {
          const payload = stringifyPayload(turn.output);
          lines.push(`[${turn.index}] TOOL ${turn.toolName} (${turn.status}): ${payload}`);
        }
        break;
      case "system_termination":
        if (!userView) {
          lines.push(`[${turn.index}] END ${turn.status}: ${turn.reason}`);
        }
        break;
    }
  }
  return lines.join("\n");
}

/**
 * Structural checks every finished trajectory satisfies: contiguous indices from 0, each
 * tool result directly after its call, and exactly one termination turn at the end.
 * Returns human-readable violations; empty means valid.
 */
export function checkTrajectoryInvariants(trajectory: Trajectory, maxTurns?: number): string[] {
  const violations: string[] = [];
  const { turns } = trajectory;
  turns.forEach((turn, position) => {
    if (turn.index !== position) {
      violations.push(`turn at position ${position} has index ${turn.index}`);
    }
    if (turn.type === "tool_result") {
      const previous = turns[position - 1];
      if (
        previous?.type !== "agent_tool_call" ||
        previous.callId !== turn.callId ||
        previous.toolName !== turn.toolName
      ) {
        violations.push(`tool result ${turn.index} does not follow its call`);
      }
    }
    if (turn.type === "system_termination" && position !== turns.length - 1) {
      violations.push(`termination turn ${turn.index} is not last`);
    }
  });
  const last = turns.at(-1);
  if (last?.type !== "system_termination" || last.status !== trajectory.status) {
    violations.push("trajectory does not end with a matching termination turn");
  }
  if (maxTurns !== undefined && trajectory.agentTurns > maxTurns) {
    violations.push(`agent turns ${trajectory.agentTurns} exceed ${maxTurns}`);
  }
  return violations;
}
