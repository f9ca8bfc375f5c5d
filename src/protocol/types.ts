/** The three option values of one event: home win, draw, away win. */
export type OptionTriple = readonly [string, string, string];

/** One block of the betting form; a whole combination fills one section. */
export interface Section {
  /** Form field name shared by the section's inputs. */
  name: string;
  triples: OptionTriple[];
}

export interface GamePage {
  sections: Section[];
  /** Absolute URL the filled form is posted to. */
  formUrl: string;
}

/** Section name -> one selected option value per event. */
export type SubmissionPayload = Record<string, string[]>;

export interface ConfirmationForm {
  fields: Record<string, string>;
  /** Absolute URL of the confirmation form's action. */
  actionUrl: string;
}

export interface BatchReceipt {
  combinations: string[];
  price: number;
  /** Outer HTML of the site's confirmation container. */
  confirmationHtml: string;
}
