import { twiml } from 'twilio';

export const buildMessagingResponse = (text: string): string => {
  const response = new twiml.MessagingResponse();
  response.message(text);
  return response.toString();
};
