export type ResolutionMethod = 'manual_rule' | 'regex_time' | 'phrase_translation' | 'statistical_parser';

export interface ResolvedMoment {
  readonly isoDatetime: string;
  /** YYYY-MM-DD in `timeZoneName` */
  readonly date: string;
  /** HH:MM, 24h, in `timeZoneName` */
  readonly time: string;
  readonly timeZoneName: string;
  readonly resolutionMethod: ResolutionMethod;
  readonly originalInput: string;
}

export interface ExtractedTime {
  hour: number;
  minute: number;
  rule: string;
}
