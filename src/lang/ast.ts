// Syntax tree for the shell language

export type WordPart =
  | { type: "text"; value: string; quoted: boolean }
  | { type: "param"; name: string; quoted: boolean };

export interface Word {
  parts: WordPart[];
  raw: string;
  line: number;
}

export interface Assignment {
  name: string;
  value: Word;
}

export interface SimpleCommand {
  type: "simple";
  assignments: Assignment[];
  words: Word[];
  line: number;
}

export interface IfCommand {
  type: "if";
  branches: Array<{ condition: Statement[]; body: Statement[] }>;
  elseBody: Statement[] | null;
}

export interface LoopCommand {
  type: "while" | "until";
  condition: Statement[];
  body: Statement[];
}

export interface ForCommand {
  type: "for";
  variable: string;
  // null: iterate over the positional parameters
  items: Word[] | null;
  body: Statement[];
}

export interface GroupCommand {
  type: "group";
  body: Statement[];
}

export interface LoopControlCommand {
  type: "break" | "continue";
  depth: Word | null;
  line: number;
}

export type Command =
  | SimpleCommand
  | IfCommand
  | LoopCommand
  | ForCommand
  | GroupCommand
  | LoopControlCommand;

export interface Pipeline {
  negated: boolean;
  command: Command;
}

export interface Statement {
  first: Pipeline;
  rest: Array<{ op: "&&" | "||"; pipeline: Pipeline }>;
}

export interface Program {
  body: Statement[];
}
