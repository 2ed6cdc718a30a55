export type SelectorType = 'css' | 'id' | 'text';

export interface ControlRef {
  selector: string;
  selectorType: SelectorType;
}

export interface StartAction extends ControlRef {
  description?: string;
}

export interface ContinueButton extends ControlRef {
  text?: string;
}

interface FieldBase {
  fieldId: string;
  selector: string;
  selectorType: SelectorType;
  required: boolean;
  label?: string;
}

export interface FillField extends FieldBase {
  interaction: 'fill';
}

export interface FillEnterField extends FieldBase {
  interaction: 'fill_enter';
}

export interface ClickField extends FieldBase {
  interaction: 'click';
}

export interface JavascriptClickField extends FieldBase {
  interaction: 'javascript_click';
}

export interface SelectField extends FieldBase {
  interaction: 'select';
}

export interface SubField {
  fieldId: string;
  selector: string;
  selectorType: SelectorType;
  interaction: 'fill' | 'select';
}

export interface GroupField extends FieldBase {
  interaction: 'group';
  addButton: ControlRef;
  saveButton: ControlRef;
  subFields: SubField[];
  minItems: number;
  maxItems?: number;
}

export type WizardField =
  | FillField
  | FillEnterField
  | ClickField
  | JavascriptClickField
  | SelectField
  | GroupField;

export type InteractionKind = WizardField['interaction'];

export interface WizardPage {
  pageNumber: number;
  title?: string;
  fields: WizardField[];
  continueButton: ContinueButton;
}

export type ResultsDeclaration =
  | { kind: 'page_text'; maxChars: number }
  | { kind: 'selectors'; fields: Record<string, ControlRef> };

export interface WizardStructure {
  wizardId: string;
  name: string;
  url: string;
  description?: string;
  startAction?: StartAction;
  pages: WizardPage[];
  results?: ResultsDeclaration;
}

export type UserData = Record<string, unknown>;
