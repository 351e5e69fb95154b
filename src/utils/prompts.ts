import { describeCatalog } from '../config/classTypes';
import { BusinessHours } from '../types/booking';
import { formatClock } from '../services/datetime/time.rules';

const BASE_PROMPT = `You are the booking assistant of a fitness studio, chatting with clients over WhatsApp in English or Spanish.

RULES:
- Reply in the language the client writes in
- Keep replies short and friendly, one question at a time
- Use the tools to check availability, book, cancel or list bookings; never invent slots or booking IDs
- Pass dates and times to the tools as the client wrote them (e.g. "mañana a las 3pm", "next friday at 8pm")
- Before booking, make sure you know the class type, the date and the time
- If a tool reports it could not understand a date, ask the client to rephrase using its suggestions
- Share the booking ID after a booking so the client can cancel later`;

export interface StudioContext {
  today: string;
  weekday: string;
  timeZoneName: string;
  businessHours: BusinessHours;
}

export interface ClientInfo {
  phone: string;
  name?: string;
}

export function buildSystemPrompt(studio: StudioContext, client?: ClientInfo | null): string {
  const parts: string[] = [BASE_PROMPT];

  parts.push(`\nCLASS TYPES:\n${describeCatalog()}`);

  parts.push(
    [
      '\nSTUDIO INFO:',
      `Business hours: ${formatClock(studio.businessHours.startHour, 0)} to ${formatClock(studio.businessHours.endHour, 0)}`,
      `Today is ${studio.weekday} ${studio.today} (${studio.timeZoneName})`,
    ].join('\n')
  );

  if (client) {
    const clientSection = [`Phone: ${client.phone}`];
    if (client.name) {
      clientSection.push(`Name: ${client.name}`);
    }
    parts.push(`\nCLIENT:\n${clientSection.join('\n')}`);
  }

  return parts.join('\n');
}
