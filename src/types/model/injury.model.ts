import type {
  BodyArea,
  InjuryStatus,
  PainFrequency,
} from "../../common/common-enum";

export interface InjuryRecord {
  description: string;
  area?: BodyArea;
  onset?: string;
  status: InjuryStatus;
  painIntensity?: number; // 0-7
  frequency?: PainFrequency;
  constraints: string[];
}

export interface InjuryNotes {
  injuries: InjuryRecord[];
  considerations: string[];
}
