export interface RepoRef {
  owner: string;
  name: string;
}

export interface SingleSelectOption {
  id: string;
  name: string;
}

export interface ProjectField {
  id: string;
  name: string;
  options?: SingleSelectOption[];
}

export interface ProjectInfo {
  id: string;
  title: string;
  number: number;
  owner: string;
  fields: ProjectField[];
}

export interface StatusFieldInfo {
  fieldId: string;
  // trimmed, lower-cased option name -> option ID
  options: Record<string, string>;
  // option names as shown on the board, in board order
  optionNames: string[];
}

export interface IssueInput {
  title: string;
  body: string;
  labels: string[];
}

export interface IssueRef {
  number: number;
  nodeId: string;
  url: string;
}
