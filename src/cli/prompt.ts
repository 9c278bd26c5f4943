import { select as inquirerSelect } from '@inquirer/prompts';

export interface SelectOption {
  label: string;
  value: string;
  description?: string;
}

/** Interactive radio-button selector using @inquirer/prompts */
export async function select(
  message: string,
  options: SelectOption[],
): Promise<string> {
  return inquirerSelect({
    message,
    choices: options.map((o) => ({
      name: o.label,
      value: o.value,
      description: o.description,
    })),
  });
}

/** A short pick-list of Edge neural voices for `init` */
export const VOICE_OPTIONS: SelectOption[] = [
  { label: 'Guy (US, male)', value: 'en-US-GuyNeural', description: 'Default' },
  { label: 'Jenny (US, female)', value: 'en-US-JennyNeural' },
  { label: 'Aria (US, female)', value: 'en-US-AriaNeural' },
  { label: 'Christopher (US, male)', value: 'en-US-ChristopherNeural' },
  { label: 'Sonia (UK, female)', value: 'en-GB-SoniaNeural' },
  { label: 'Ryan (UK, male)', value: 'en-GB-RyanNeural' },
  { label: 'Natasha (AU, female)', value: 'en-AU-NatashaNeural' },
  { label: 'William (AU, male)', value: 'en-AU-WilliamNeural' },
];
