import {
  contactProblems,
  fieldsOf,
  missingRequiredFields,
  pickString,
} from './form-schema';

describe('form-schema', () => {
  const schema = {
    fields: [
      { name: 'customer_name', label: 'Full Name', required: true },
      { name: 'phone', type: 'phone', required: true },
      { name: 'notes', required: false },
      { name: 'gender', options: [{ value: 'male' }] },
    ],
  };

  it('should list required fields that are missing or blank', () => {
    expect(
      missingRequiredFields(schema, { customer_name: '  ', notes: 'x' }),
    ).toEqual(['customer_name', 'phone']);
  });

  it('should accept non-string values for required fields', () => {
    expect(
      missingRequiredFields(schema, { customer_name: 'Asha', phone: 9999999999 }),
    ).toEqual([]);
  });

  it('should treat schemas without fields as having no requirements', () => {
    expect(missingRequiredFields({}, {})).toEqual([]);
    expect(fieldsOf({ fields: 'nope' })).toEqual([]);
  });

  it('should keep unknown field attributes', () => {
    expect(fieldsOf(schema)[0]).toEqual({
      name: 'customer_name',
      label: 'Full Name',
      required: true,
    });
  });

  it('should pick the first non-blank string', () => {
    expect(pickString({ a: '', b: 'second' }, 'a', 'b')).toBe('second');
    expect(pickString({ phone: 9876 }, 'phone')).toBe('9876');
    expect(pickString({}, 'missing')).toBe('');
  });

  describe('contactProblems', () => {
    it('should accept contacts within the column limits', () => {
      expect(
        contactProblems({
          customerName: 'Farah Ali',
          customerEmail: '',
          customerPhone: '9111111111',
        }),
      ).toEqual([]);
    });

    it('should report over-long phones and invalid emails', () => {
      expect(
        contactProblems({
          customerName: 'Farah Ali',
          customerEmail: 'farah-at-example',
          customerPhone: '9'.repeat(21),
        }),
      ).toEqual([
        'customerEmail must be an email',
        'customerPhone must be shorter than or equal to 20 characters',
      ]);
    });
  });
});
