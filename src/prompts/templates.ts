import { FieldName } from '../types';

export interface FieldGuidance {
  explanation: string;
  examples: string[];
  help: string;
  prompt: string;
}

export const FIELD_GUIDANCE: Record<FieldName, FieldGuidance> = {
  full_name: {
    explanation: 'Your name should be between 2 and 100 characters.',
    examples: ['John Smith', 'Maria Rodriguez', 'Ahmed Khan'],
    help: "I need your full name. For example, 'John Smith' or 'Maria Rodriguez'.",
    prompt: 'What is your full name?',
  },
  email: {
    explanation: 'Please provide a valid email address.',
    examples: ['user@example.com', 'name.surname@company.co.uk'],
    help: "I need a valid email address where you can be contacted. For example, 'user@example.com'.",
    prompt: 'What is your email address?',
  },
  age: {
    explanation: 'Your age should be a number between 18 and 120.',
    examples: ['30', '45', '62'],
    help: 'Please provide your age as a number between 18 and 120.',
    prompt: 'How old are you?',
  },
  occupation: {
    explanation: 'Your occupation should be between 2 and 100 characters.',
    examples: ['Software Developer', 'Teacher', 'Product Manager'],
    help: "Please tell me your current job or profession. For example, 'Software Developer' or 'Teacher'.",
    prompt: 'What is your current job or profession?',
  },
  experience_level: {
    explanation: 'Please select one of the valid experience levels.',
    examples: ['Beginner', 'Intermediate', 'Advanced', 'Expert'],
    help: 'Please select your experience level from: Beginner, Intermediate, Advanced, or Expert.',
    prompt: 'Now, please tell me your experience level. Choose from: Beginner, Intermediate, Advanced, or Expert.',
  },
  preferred_language: {
    explanation: 'Please select one of the valid programming languages.',
    examples: ['Python', 'JavaScript', 'Java', 'C++', 'Go', 'Rust', 'Other'],
    help: 'Please select your preferred programming language from: Python, JavaScript, Java, C++, Go, Rust, or Other.',
    prompt: "What's your preferred programming language? Options are: Python, JavaScript, Java, C++, Go, Rust, or Other.",
  },
  project_interests: {
    explanation: 'Please provide 1 to 5 project interests.',
    examples: ['Web Development', 'Machine Learning, Data Analysis', 'Game Development, Mobile Apps, Cloud Computing'],
    help: "Please list between 1 and 5 project areas you're interested in. For example, 'Web Development, Machine Learning'.",
    prompt: 'What projects are you interested in? You can list between 1 and 5 interests.',
  },
  availability_per_week: {
    explanation: 'Please provide a number between 1 and 168 for weekly availability hours.',
    examples: ['10', '20', '40'],
    help: 'How many hours per week can you dedicate to the project? Please provide a number between 1 and 168.',
    prompt: 'How many hours per week are you available for the project?',
  },
  start_date: {
    explanation: 'Please provide a valid date in YYYY-MM-DD format.',
    examples: ['2025-06-01', '2025-07-15', '2025-08-30'],
    help: "When would you like to start? Please provide a date in YYYY-MM-DD format, for example, '2025-06-01'.",
    prompt: 'When would you like to start? Please provide a date in YYYY-MM-DD format.',
  },
  additional_notes: {
    explanation: 'Additional notes can be at most 500 characters.',
    examples: ['I prefer remote work.', 'Available on weekends only.'],
    help: "Tell me anything else we should know, such as special requirements. This field is optional, so you can also say 'skip'.",
    prompt: "Is there anything else you'd like to add? This one is optional, so you can say 'skip'.",
  },
};

export const MESSAGES = {
  GREETING: (firstPrompt: string) =>
    `Hello! I'm your voice assistant, here to help you complete this form. Let's start with your full name. ${firstPrompt}`,

  CONFIRMATION: (label: string, value: string) => `I've captured that your ${label} is: ${value}. Is that correct?`,

  SAVED: (label: string, value: string) => `Great! I've saved your ${label}: ${value}`,

  RETRY: (label: string) => `I apologize for the misunderstanding. Let's try again. What is your ${label}?`,

  CANNOT_SKIP: (label: string) =>
    `I'm sorry, but ${label} is a required field and cannot be skipped. Could you please provide this information?`,

  SKIPPED: (label: string) => `No problem, we can skip the ${label} field.`,

  NOT_UNDERSTOOD: "I'm sorry, I didn't understand that. Could you please repeat?",

  TROUBLE: "I'm having trouble processing your input. Could you please try again?",

  ALREADY_COMPLETE: "The form is already complete. Say 'restart' if you'd like to fill it in again.",

  COMPLETION: (summary: string) =>
    `Excellent! We've completed all the required information. Here's a summary of what you've provided:\n\n${summary}\n\nThank you for providing all this information. The form has been submitted successfully.`,
};
