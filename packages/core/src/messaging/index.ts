export { sendEmail } from './email';
export { welcomeEmail, communicationEmail } from './templates';
export { deliverPendingCommunications } from './deliver';
export type { DeliveryRun } from './deliver';
export {
  normalizePhone,
  HubtelProvider,
  TextMeProvider,
  GenericHttpProvider,
  createSmsProvider,
  SmsGateway,
  getSmsGateway,
  setSmsGateway,
} from './sms';
export type { SmsProvider } from './sms';
