import dotenv from 'dotenv';

dotenv.config({ path: '.env.local' });

export const ADMIN_EMAILS: string[] = (process.env['ADMIN_EMAILS'] || '')
  .split(',')
  .map(email => email.trim().toLowerCase())
  .filter(email => email.length > 0);
