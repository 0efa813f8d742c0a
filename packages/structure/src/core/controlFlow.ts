/**
 * Loop and condition labels recorded in the call registry next to real
 * callees. They only ever show up in the graph, drawn apart from calls.
 */

const CONTROL_FLOW_KINDS = ["condition", "for_loop", "while_loop"] as const;

export type ControlFlowKind = (typeof CONTROL_FLOW_KINDS)[number];

const PREFIXES: Record<ControlFlowKind, string> = {
  condition: "Condition: ",
  for_loop: "For Loop: ",
  while_loop: "While Loop: ",
};

export function controlFlowLabel(kind: ControlFlowKind, text: string): string {
  return `${PREFIXES[kind]}${text}`;
}

export function controlFlowKindOf(descriptor: string): ControlFlowKind | undefined {
  return CONTROL_FLOW_KINDS.find((kind) => descriptor.startsWith(PREFIXES[kind]));
}

export function isControlFlowLabel(descriptor: string): boolean {
  return controlFlowKindOf(descriptor) !== undefined;
}
