import { firstFormValue, parseSmsForm } from './sms-form';

describe('parseSmsForm', () => {
  it('reads Body and From from a form-encoded body', () => {
    expect(
      parseSmsForm(
        'ToCountry=US&Body=Fire+at+5th+%26+Main&From=%2B15550100&NumMedia=0',
      ),
    ).toEqual({ description: 'Fire at 5th & Main', contact: '+15550100' });
  });

  it('defaults missing fields to empty strings', () => {
    expect(parseSmsForm('From=%2B15550100')).toEqual({
      description: '',
      contact: '+15550100',
    });
    expect(parseSmsForm('')).toEqual({ description: '', contact: '' });
    expect(parseSmsForm(null)).toEqual({ description: '', contact: '' });
  });

  it('keeps the first value of a repeated field', () => {
    expect(parseSmsForm('Body=first&Body=second').description).toBe('first');
  });
});

describe('firstFormValue', () => {
  it('keeps a plain string', () => {
    expect(firstFormValue('Fire at 5th and Main')).toBe('Fire at 5th and Main');
  });

  it('takes the first entry of a repeated field', () => {
    expect(firstFormValue(['first', 'second'])).toBe('first');
  });

  it.each([undefined, null, 42, { x: 'fire' }, [], [{ x: 'fire' }]])(
    'turns %p into an empty string',
    (value) => {
      expect(firstFormValue(value)).toBe('');
    },
  );
});
